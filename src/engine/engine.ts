import type { ActionLog } from '../action-log/action-logger.js';
import { defaultApprovalCallback, type ApprovalCallback } from '../approval/callback.js';
import { ApprovalPolicy } from '../approval/policy.js';
import type { AuditLog, ToolExecutionEvent } from '../audit/audit-log.js';
import type { StewardConfig } from '../config/config.js';
import { Sandbox } from '../security/sandbox.js';
import { Sanitizer } from '../security/sanitizer.js';
import { denied, errorMessage, fail, resultText } from '../shared/result.js';
import { createMessage } from '../shared/session.js';
import type { Message, Session, Tool, ToolCall, ToolContext, ToolResult } from '../shared/types.js';
import type { ToolSystem } from '../tools/tool-system.js';
import { toWireMessage } from './messages.js';
import type { ContextBuilder, ModelCompleter, SessionStore, SkillSource } from './model.js';

export const MAX_ROUNDS_MESSAGE =
  "I've reached the maximum number of tool call rounds. Please try a simpler request.";

export type ToolExecutedHook = (
  toolName: string,
  params: Record<string, unknown>,
  result: ToolResult,
) => Promise<void> | void;

export interface EngineOptions {
  config: StewardConfig;
  model: ModelCompleter;
  tools: ToolSystem;
  audit: AuditLog;
  actionLog: ActionLog;
  approvalCallback?: ApprovalCallback;
  policy?: ApprovalPolicy;
  sandbox?: Sandbox;
  sanitizer?: Sanitizer;
  contextBuilder?: ContextBuilder;
  sessionStore?: SessionStore;
  skills?: SkillSource;
  onToolExecuted?: ToolExecutedHook;
}

/**
 * The agent loop. Calls the model, runs the tools it asks for through the
 * security pipeline (disabled list, sandbox, approval, audit) and feeds the
 * results back until the model answers in text or the round budget runs out.
 *
 * The engine takes no lock: callers must not run two turns of the same
 * session at once.
 */
export class Engine {
  readonly config: StewardConfig;
  readonly tools: ToolSystem;
  readonly audit: AuditLog;
  readonly policy: ApprovalPolicy;
  readonly sandbox: Sandbox;
  readonly sanitizer: Sanitizer;
  /** Replaced by an adapter that can ask its user. */
  approvalCallback: ApprovalCallback;
  onToolExecuted?: ToolExecutedHook;

  private readonly model: ModelCompleter;
  private readonly actionLog: ActionLog;
  private readonly contextBuilder?: ContextBuilder;
  private readonly sessionStore?: SessionStore;
  private readonly skills?: SkillSource;

  constructor(options: EngineOptions) {
    this.config = options.config;
    this.model = options.model;
    this.tools = options.tools;
    this.audit = options.audit;
    this.actionLog = options.actionLog;
    this.approvalCallback = options.approvalCallback ?? defaultApprovalCallback;
    this.policy = options.policy ?? new ApprovalPolicy(options.config.security);
    this.sandbox = options.sandbox ?? new Sandbox(options.config.sandbox);
    this.sanitizer = options.sanitizer ?? new Sanitizer();
    this.contextBuilder = options.contextBuilder;
    this.sessionStore = options.sessionStore;
    this.skills = options.skills;
    this.onToolExecuted = options.onToolExecuted;
  }

  async processMessage(userText: string, session: Session, model?: string): Promise<string> {
    this.syncTrust(session);
    const text = this.sanitizer.sanitizeUserInput(userText);
    session.messages.push(createMessage('user', text));
    await this.safeActionLog(() => this.actionLog.logConversation(session.id, 'user', text));

    const context = await this.buildContext(session);
    const maxRounds = this.config.maxToolRounds;

    for (let round = 0; round < maxRounds; round++) {
      const tools = this.tools.registry.getOpenAiTools();
      const response = await this.model.complete({
        messages: context.map(toWireMessage),
        model,
        tools: tools.length > 0 ? tools : undefined,
      });

      const usage = response.usage;
      if (usage) {
        this.safeAudit(() =>
          this.audit.logTokenUsage({
            sessionId: session.id,
            model: response.model || model || this.model.defaultModel,
            ...usage,
          }),
        );
      }

      if (response.toolCalls.length === 0) {
        return this.finish(session, response.content ?? '');
      }

      const assistantMsg = createMessage('assistant', response.content ?? '', {
        toolCalls: response.toolCalls,
      });
      session.messages.push(assistantMsg);
      context.push(assistantMsg);

      for (const call of response.toolCalls) {
        const toolMsg = await this.runToolCall(call, session);
        session.messages.push(toolMsg);
        context.push(toolMsg);
      }
    }

    // eslint-disable-next-line no-console
    console.warn(`Tool rounds exhausted (${maxRounds}) for session ${session.id.slice(0, 8)}`);
    let content = '';
    try {
      const final = await this.model.complete({ messages: context.map(toWireMessage), model });
      content = final.content ?? '';
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('Final answer after exhausted rounds failed:', errorMessage(err));
    }

    return this.finish(session, content || MAX_ROUNDS_MESSAGE);
  }

  /**
   * Runs a tool outside a conversation, for the scheduler and workflows.
   * Resolves with the output; rejects with the error or denial text.
   */
  async executeTool(toolName: string, params: Record<string, unknown>): Promise<string> {
    const result = await this.tools.execute(toolName, params, this.toolContext('scheduler'));
    if (result.status === 'ok') return result.output;
    throw new Error(resultText(result) || 'Tool execution failed');
  }

  private async finish(session: Session, content: string): Promise<string> {
    session.messages.push(createMessage('assistant', content));
    await this.safeActionLog(() => this.actionLog.logConversation(session.id, 'assistant', content));

    if (this.sessionStore) {
      try {
        await this.sessionStore.saveSession(session);
      } catch (err) {
        // eslint-disable-next-line no-console
        console.warn('Session save failed:', errorMessage(err));
      }
    }
    return content;
  }

  private async buildContext(session: Session): Promise<Message[]> {
    if (this.contextBuilder) {
      try {
        return await this.contextBuilder.buildContext(session, this.config.systemPrompt, {
          corePrompt: this.config.corePrompt,
          activeSkills: this.skills?.getActiveSkills() ?? [],
        });
      } catch (err) {
        // eslint-disable-next-line no-console
        console.warn('Context build failed, using session history:', errorMessage(err));
      }
    }
    const history = session.messages.filter((m) => m.role !== 'system');
    return [createMessage('system', this.config.systemPrompt), ...history];
  }

  /** Handles one call end to end and returns the tool message for the context. */
  private async runToolCall(call: ToolCall, session: Session): Promise<Message> {
    const result = await this.handleToolCall(call, session);

    const output = this.sanitizer.sanitizeToolOutput(resultText(result));
    const injection = this.sanitizer.checkInjection(output);
    if (injection.suspicious) {
      this.safeAudit(() =>
        this.audit.logSecurityEvent(
          'injection_detected',
          session.id,
          `Tool ${call.name} output matched: ${injection.matched ?? ''}`,
        ),
      );
    }

    if (this.onToolExecuted) {
      try {
        await this.onToolExecuted(call.name, call.arguments, result);
      } catch (err) {
        // eslint-disable-next-line no-console
        console.warn('Tool callback error:', errorMessage(err));
      }
    }

    return createMessage('tool', output, { name: call.name, toolCallId: call.id });
  }

  private async handleToolCall(call: ToolCall, session: Session): Promise<ToolResult> {
    const base = {
      sessionId: session.id,
      source: session.adapter,
      toolName: call.name,
      parameters: call.arguments,
    };

    const tool = this.tools.registry.get(call.name);
    if (!tool) {
      this.safeAudit(() =>
        this.audit.logToolExecution({ ...base, approved: false, riskLevel: '', resultSummary: 'Unknown tool' }),
      );
      return fail(`Unknown tool: ${call.name}`);
    }

    const risk = { ...base, riskLevel: tool.riskLevel };

    if (this.config.security.disabledTools.includes(call.name)) {
      return this.deny(risk, 'Disabled by configuration', `Tool '${call.name}' is disabled by configuration`);
    }

    const blocked = this.sandboxCheck(tool, call.arguments);
    if (blocked) {
      return this.deny(risk, `Blocked: ${blocked}`, blocked);
    }

    this.syncTrust(session);
    const decision = this.policy.check(call.name, tool.riskLevel, session.id);
    if (!decision.approved) {
      // eslint-disable-next-line no-console
      console.log(`Approval requested: ${call.name} (${tool.riskLevel}): ${decision.reason}`);
      if (!(await this.askApproval(tool, call, session))) {
        // eslint-disable-next-line no-console
        console.warn(`Approval denied: ${call.name} (${tool.riskLevel})`);
        return this.deny(risk, 'Denied by user', 'User denied the action');
      }
    }

    const start = Date.now();
    const result = await this.tools.execute(call.name, call.arguments, this.toolContext(session.id));
    const durationMs = Date.now() - start;
    const status = result.status === 'ok' ? 'ok' : 'error';

    this.safeAudit(() =>
      this.audit.logToolExecution({ ...risk, approved: true, resultSummary: `${status} (${durationMs}ms)` }),
    );
    await this.safeActionLog(() =>
      this.actionLog.logToolCall({
        sessionId: session.id,
        toolName: call.name,
        params: call.arguments,
        resultOutput: resultText(result),
        status,
        durationMs,
        error: result.status === 'ok' ? null : resultText(result),
      }),
    );

    return result;
  }

  /** Fails closed: a callback that throws counts as a refusal. */
  private async askApproval(tool: Tool, call: ToolCall, session: Session): Promise<boolean> {
    try {
      return await this.approvalCallback(call.name, call.arguments, tool.riskLevel, session);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error(`Approval callback failed for ${call.name}:`, errorMessage(err));
      return false;
    }
  }

  private async deny(
    event: Omit<ToolExecutionEvent, 'approved' | 'resultSummary'>,
    summary: string,
    reason: string,
  ): Promise<ToolResult> {
    this.safeAudit(() => this.audit.logToolExecution({ ...event, approved: false, resultSummary: summary }));
    await this.safeActionLog(() =>
      this.actionLog.logToolCall({
        sessionId: event.sessionId,
        toolName: event.toolName,
        params: event.parameters,
        status: 'denied',
        error: reason,
      }),
    );
    return denied(reason);
  }

  /** Mirrors the policy's expiring trust onto the session adapters display. */
  private syncTrust(session: Session): void {
    session.trustLevel = this.policy.getSessionTrust(session.id).currentLevel();
  }

  /** Returns the reason a call is blocked, or null when the sandbox lets it through. */
  private sandboxCheck(tool: Tool, args: Record<string, unknown>): string | null {
    const rule = tool.sandbox;
    switch (rule.kind) {
      case 'none':
        return null;
      case 'shell': {
        const command = args[rule.commandParam];
        if (typeof command === 'string' && command && !this.sandbox.isCommandAllowed(command)) {
          return 'Command blocked by sandbox policy';
        }
        return null;
      }
      case 'path': {
        for (const param of rule.pathParams) {
          const target = args[param];
          if (typeof target !== 'string' || !target) continue;
          const check = this.sandbox.validateFileOperation(target, rule.operation);
          if (!check.allowed) return check.reason;
        }
        return null;
      }
    }
  }

  private toolContext(sessionId: string): ToolContext {
    return {
      sessionId,
      allowedDirectories: this.sandbox.allowedDirectories,
      maxExecutionMs: this.config.sandbox.maxExecutionSeconds * 1000,
      maxOutputSize: this.config.sandbox.maxOutputSize,
    };
  }

  /** Audit writes never break a turn. */
  private safeAudit(write: () => unknown): void {
    try {
      write();
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('Audit write failed:', errorMessage(err));
    }
  }

  /** Action-log sinks are telemetry; a rejected write never ends the turn. */
  private async safeActionLog(write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('Action log write failed:', errorMessage(err));
    }
  }
}
