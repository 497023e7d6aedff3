import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { auditDbPath, defaultConfig, expandHome, loadConfig, parseConfig } from '../config.js';

describe('config', () => {
  it('should fill every default', () => {
    const config = defaultConfig();
    expect(config.maxToolRounds).toBe(10);
    expect(config.security).toEqual({
      autoApproveLevels: ['low'],
      requireApprovalFor: ['shell_execute', 'send_message'],
      disabledTools: [],
      sessionTrustEnabled: true,
      trustTimeoutMinutes: 30,
      approvalTimeoutSeconds: 60,
    });
    expect(config.sandbox.maxOutputSize).toBe(100_000);
    expect(config.actionLog.mode).toBe('tools_only');
    expect(config.server).toEqual({ port: 9000, host: '127.0.0.1', secret: '' });
  });

  it('should merge partial sections with defaults', () => {
    const config = parseConfig({ security: { disabledTools: ['shell_execute'] }, maxToolRounds: 3 });
    expect(config.security.disabledTools).toEqual(['shell_execute']);
    expect(config.security.autoApproveLevels).toEqual(['low']);
    expect(config.maxToolRounds).toBe(3);
  });

  it('should reject values of the wrong shape', () => {
    expect(() => parseConfig({ security: { autoApproveLevels: ['severe'] } })).toThrow(
      /^Invalid config: security\.autoApproveLevels\.0: /,
    );
    expect(() => parseConfig({ maxToolRounds: 0 })).toThrow(/^Invalid config: maxToolRounds: /);
  });

  it('should expand a leading tilde only', () => {
    expect(expandHome('~')).toBe(os.homedir());
    expect(expandHome('~/Documents')).toBe(path.join(os.homedir(), 'Documents'));
    expect(expandHome('/opt/~x')).toBe('/opt/~x');
  });

  it('should place the audit database under home unless set', () => {
    const config = parseConfig({ home: '/srv/steward' });
    expect(auditDbPath(config)).toBe(path.join('/srv/steward', 'audit.db'));
    expect(auditDbPath(parseConfig({ audit: { dbPath: '/data/a.db' } }))).toBe('/data/a.db');
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
      vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
      vi.restoreAllMocks();
    });

    it('should use defaults when the file is missing', async () => {
      const config = await loadConfig(path.join(dir, 'missing.json'), {});
      expect(config).toEqual(defaultConfig());
      expect(console.error).not.toHaveBeenCalled();
    });

    it('should read the file and apply environment overrides', async () => {
      const file = path.join(dir, 'config.json');
      fs.writeFileSync(file, JSON.stringify({ server: { port: 7000 }, sandbox: { allowedDirectories: ['/srv'] } }));

      const config = await loadConfig(file, {
        PORT: '7100',
        INTERNAL_SECRET: 'test-secret',
        AUDIT_HMAC_KEY: 'test-hmac',
        AUDIT_DB_PATH: '/tmp/audit.db',
      });

      expect(config.sandbox.allowedDirectories).toEqual(['/srv']);
      expect(config.server).toEqual({ port: 7100, host: '127.0.0.1', secret: 'test-secret' });
      expect(config.audit).toEqual({ dbPath: '/tmp/audit.db', hmacKey: 'test-hmac' });
    });

    it('should find the file under STEWARD_HOME', async () => {
      fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ maxToolRounds: 4 }));
      const config = await loadConfig(undefined, { STEWARD_HOME: dir });
      expect(config.maxToolRounds).toBe(4);
      expect(config.home).toBe(dir);
    });

    it('should fall back to defaults on a broken file', async () => {
      const file = path.join(dir, 'config.json');
      fs.writeFileSync(file, '{ not json');
      const config = await loadConfig(file, {});
      expect(config).toEqual(defaultConfig());
      expect(console.error).toHaveBeenCalledOnce();
    });
  });
});
