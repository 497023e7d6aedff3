import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { errorMessage } from '../shared/result.js';

const riskLevelSchema = z.enum(['low', 'medium', 'high', 'critical']);

export const securityConfigSchema = z.object({
  autoApproveLevels: z.array(riskLevelSchema).default(['low']),
  requireApprovalFor: z.array(z.string()).default(['shell_execute', 'send_message']),
  disabledTools: z.array(z.string()).default([]),
  sessionTrustEnabled: z.boolean().default(true),
  trustTimeoutMinutes: z.number().positive().default(30),
  approvalTimeoutSeconds: z.number().positive().default(60),
});

export const sandboxConfigSchema = z.object({
  allowedDirectories: z.array(z.string()).default(['~/Documents', '~/Desktop']),
  blockedCommands: z
    .array(z.string())
    .default(['rm -rf /', 'format', 'del /f /s /q C:\\', 'reg delete', 'rmdir /s /q C:\\']),
  maxExecutionSeconds: z.number().positive().default(30),
  maxOutputSize: z.number().int().positive().default(100_000),
});

export const actionLogConfigSchema = z.object({
  mode: z.enum(['tools_only', 'full', 'mutations_only']).default('tools_only'),
  includeFullResult: z.boolean().default(false),
});

export const auditConfigSchema = z.object({
  dbPath: z.string().optional(),
  hmacKey: z.string().optional(),
});

export const serverConfigSchema = z.object({
  port: z.number().int().default(9000),
  host: z.string().default('127.0.0.1'),
  secret: z.string().default(''),
});

export const configSchema = z.object({
  home: z.string().default('~/.steward'),
  systemPrompt: z.string().default('You are a helpful personal assistant running on the user\'s computer.'),
  corePrompt: z.string().default(''),
  maxToolRounds: z.number().int().positive().default(10),
  security: securityConfigSchema.default({}),
  sandbox: sandboxConfigSchema.default({}),
  actionLog: actionLogConfigSchema.default({}),
  audit: auditConfigSchema.default({}),
  server: serverConfigSchema.default({}),
});

export type StewardConfig = z.infer<typeof configSchema>;
export type SecurityConfig = z.infer<typeof securityConfigSchema>;
export type SandboxConfig = z.infer<typeof sandboxConfigSchema>;
export type ActionLogConfig = z.infer<typeof actionLogConfigSchema>;

export function defaultConfig(): StewardConfig {
  return configSchema.parse({});
}

export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function resolveHome(config: StewardConfig): string {
  return path.resolve(expandHome(config.home));
}

export function auditDbPath(config: StewardConfig): string {
  return config.audit.dbPath ?? path.join(resolveHome(config), 'audit.db');
}

/**
 * Parses a raw config object. Unknown keys are dropped, missing keys take
 * their defaults. Throws on values of the wrong shape.
 */
export function parseConfig(raw: unknown): StewardConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid config: ${issues}`);
  }
  return result.data;
}

function applyEnv(config: StewardConfig, env: NodeJS.ProcessEnv): StewardConfig {
  const next: StewardConfig = { ...config, audit: { ...config.audit }, server: { ...config.server } };
  if (env.STEWARD_HOME) next.home = env.STEWARD_HOME;
  if (env.AUDIT_DB_PATH) next.audit.dbPath = env.AUDIT_DB_PATH;
  if (env.AUDIT_HMAC_KEY) next.audit.hmacKey = env.AUDIT_HMAC_KEY;
  if (env.INTERNAL_SECRET) next.server.secret = env.INTERNAL_SECRET;
  if (env.PORT) {
    const port = parseInt(env.PORT, 10);
    if (!Number.isNaN(port)) next.server.port = port;
  }
  return next;
}

/**
 * Loads the JSON config file, falling back to defaults when it is missing
 * or invalid. Environment variables override file values.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<StewardConfig> {
  const home = expandHome(env.STEWARD_HOME ?? '~/.steward');
  const file = configPath ?? env.STEWARD_CONFIG ?? path.join(home, 'config.json');

  let config: StewardConfig;
  try {
    config = parseConfig(JSON.parse(await readFile(file, 'utf-8')));
    // eslint-disable-next-line no-console
    console.log(`Loaded config from ${file}`);
  } catch (err) {
    if (isMissingFile(err)) {
      config = defaultConfig();
    } else {
      // eslint-disable-next-line no-console
      console.error(`Failed to load config from ${file}:`, errorMessage(err));
      config = defaultConfig();
    }
  }

  return applyEnv(config, env);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
