import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ActionLogger } from '../action-logger.js';

function readLines(file: string): Record<string, unknown>[] {
  return fs
    .readFileSync(file, 'utf-8')
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe('ActionLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'action-log-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should name files by UTC day', () => {
    const logger = new ActionLogger(dir);
    expect(logger.logPath(new Date('2024-03-05T23:30:00Z'))).toBe(path.join(dir, 'actions-2024-03-05.jsonl'));
  });

  it('should append tool calls with redacted params and the result size', async () => {
    const logger = new ActionLogger(dir, { mode: 'tools_only', includeFullResult: false });
    await logger.logToolCall({
      sessionId: 's1',
      toolName: 'file_read',
      params: { path: '/a', password: 'hunter2' },
      resultOutput: 'héllo',
      status: 'ok',
      durationMs: 5,
    });

    const [entry] = readLines(logger.logPath());
    expect(entry).toMatchObject({
      sid: 's1',
      type: 'tool_call',
      tool: 'file_read',
      params: { path: '/a', password: '***REDACTED***' },
      status: 'ok',
      duration_ms: 5,
      result_size: 6,
    });
    expect(entry).not.toHaveProperty('result');
    expect(entry).not.toHaveProperty('error');
  });

  it('should keep the result text when configured to', async () => {
    const logger = new ActionLogger(dir, { mode: 'tools_only', includeFullResult: true });
    await logger.logToolCall({ sessionId: 's1', toolName: 'get_time', params: {}, resultOutput: 'noon', status: 'ok' });
    expect(readLines(logger.logPath())[0]).toMatchObject({ result: 'noon', duration_ms: 0 });
  });

  it('should record denials with their reason', async () => {
    const logger = new ActionLogger(dir);
    await logger.logToolCall({
      sessionId: 's1',
      toolName: 'shell_execute',
      params: { command: 'rm -rf /' },
      status: 'denied',
      error: 'Command blocked by sandbox policy',
    });
    expect(readLines(logger.logPath())[0]).toMatchObject({
      status: 'denied',
      error: 'Command blocked by sandbox policy',
      result_size: 0,
    });
  });

  it('should only record mutating tools in mutations_only mode', async () => {
    const logger = new ActionLogger(dir, { mode: 'mutations_only', includeFullResult: false });
    await logger.logToolCall({ sessionId: 's1', toolName: 'get_time', params: {}, status: 'ok' });
    await logger.logToolCall({ sessionId: 's1', toolName: 'file_write', params: {}, status: 'ok' });

    expect(readLines(logger.logPath()).map((e) => e.tool)).toEqual(['file_write']);
  });

  it('should record conversation turns only in full mode', async () => {
    const quiet = new ActionLogger(dir);
    await quiet.logConversation('s1', 'user', 'hello');
    expect(fs.existsSync(quiet.logPath())).toBe(false);

    const full = new ActionLogger(dir, { mode: 'full', includeFullResult: false });
    await full.logConversation('s1', 'user', 'hello');
    expect(readLines(full.logPath())[0]).toMatchObject({
      sid: 's1',
      type: 'message',
      role: 'user',
      content_size: 5,
      content_preview: 'hello',
    });
  });

  it('should report write failures without throwing', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const blocker = path.join(dir, 'not-a-dir');
    fs.writeFileSync(blocker, '');

    const logger = new ActionLogger(blocker);
    await expect(
      logger.logToolCall({ sessionId: 's1', toolName: 'file_read', params: {}, status: 'ok' }),
    ).resolves.toBeUndefined();
    expect(error).toHaveBeenCalledOnce();
  });
});
