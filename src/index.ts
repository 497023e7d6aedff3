import path from 'node:path';
import { ActionLogger } from './action-log/action-logger.js';
import { ApprovalBroker } from './approval/broker.js';
import { createBrokeredApprovalCallback, type ApprovalNotifier } from './approval/callback.js';
import { ApprovalPolicy } from './approval/policy.js';
import { AuditLog } from './audit/audit-log.js';
import { auditDbPath, resolveHome, type StewardConfig } from './config/config.js';
import { Engine, type EngineOptions } from './engine/engine.js';
import type { ModelCompleter } from './engine/model.js';
import { Sandbox } from './security/sandbox.js';
import { Sanitizer } from './security/sanitizer.js';
import { builtinTools } from './tools/builtin/index.js';
import { ToolSystem, type ToolFactory } from './tools/tool-system.js';

export * from './shared/types.js';
export * from './shared/risk.js';
export * from './shared/result.js';
export * from './shared/session.js';
export * from './config/config.js';
export { ToolRegistry, toOpenAiTool } from './tools/registry.js';
export { ToolSystem, type ToolFactory } from './tools/tool-system.js';
export * from './tools/builtin/index.js';
export { Sandbox, DANGEROUS_PATTERNS } from './security/sandbox.js';
export { Sanitizer } from './security/sanitizer.js';
export { AuditLog } from './audit/audit-log.js';
export { ApprovalPolicy } from './approval/policy.js';
export { SessionTrust } from './approval/session-trust.js';
export * from './approval/broker.js';
export * from './approval/callback.js';
export * from './action-log/action-logger.js';
export * from './engine/model.js';
export { parseWireToolCall, toWireMessage, toWireToolCall } from './engine/messages.js';
export { Engine, MAX_ROUNDS_MESSAGE, type EngineOptions, type ToolExecutedHook } from './engine/engine.js';
export { createControlApp } from './server/app.js';
export { generateInternalToken, verifyInternalToken } from './server/auth.js';

export interface StewardOptions {
  config: StewardConfig;
  model: ModelCompleter;
  /** Delivers approval prompts. Without one, only LOW-risk calls can run. */
  notify?: ApprovalNotifier;
  /** Registered after the built-in tools; a same-named tool replaces the built-in. */
  tools?: ToolFactory[];
  engine?: Pick<EngineOptions, 'contextBuilder' | 'sessionStore' | 'skills' | 'onToolExecuted'>;
}

export interface Steward {
  engine: Engine;
  broker: ApprovalBroker;
  audit: AuditLog;
  close(): void;
}

/** Wires an engine with its audit log, action log, sandbox and approval broker. */
export function createSteward(options: StewardOptions): Steward {
  const { config } = options;
  const home = resolveHome(config);

  const tools = new ToolSystem();
  tools.registerAll([...builtinTools(), ...(options.tools ?? [])]);

  const audit = new AuditLog({ dbPath: auditDbPath(config), hmacKey: config.audit.hmacKey });
  const actionLog = new ActionLogger(path.join(home, 'logs'), config.actionLog);
  const policy = new ApprovalPolicy(config.security);
  const broker = new ApprovalBroker(config.security.approvalTimeoutSeconds * 1000);

  const engine = new Engine({
    ...options.engine,
    config,
    model: options.model,
    tools,
    audit,
    actionLog,
    policy,
    sandbox: new Sandbox(config.sandbox),
    sanitizer: new Sanitizer(),
    approvalCallback: options.notify
      ? createBrokeredApprovalCallback({ broker, policy, notify: options.notify })
      : undefined,
  });

  return {
    engine,
    broker,
    audit,
    close() {
      broker.cancelAll();
      audit.close();
    },
  };
}
