import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { ActionLogConfig } from '../config/config.js';
import { errorMessage } from '../shared/result.js';

/** Telemetry sink the engine writes to alongside the audit log. */
export interface ActionLog {
  logToolCall(entry: ToolCallLogEntry): Promise<void>;
  logConversation(sessionId: string, role: string, content: string): Promise<void>;
}

export interface ToolCallLogEntry {
  sessionId: string;
  toolName: string;
  params: Record<string, unknown>;
  resultOutput?: string;
  status: 'ok' | 'error' | 'denied';
  durationMs?: number;
  error?: string | null;
}

export const MUTATION_TOOLS: ReadonlySet<string> = new Set([
  'file_write', 'shell_execute', 'clipboard_write',
  'calendar_write', 'send_message', 'memory_store',
]);

const SENSITIVE_KEY_PARTS = [
  'api_key', 'api-key', 'apikey',
  'password', 'passwd', 'secret',
  'token', 'credential', 'auth',
];

function redactKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactKeys);
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const lower = key.toLowerCase();
      result[key] = SENSITIVE_KEY_PARTS.some((p) => lower.includes(p)) ? '***REDACTED***' : redactKeys(item);
    }
    return result;
  }
  return value;
}

/**
 * Operation history as JSON lines, one file per UTC day. Writing never
 * throws; failures are reported on stderr.
 */
export class ActionLogger implements ActionLog {
  constructor(
    private readonly logDir: string,
    private readonly config: ActionLogConfig = { mode: 'tools_only', includeFullResult: false },
  ) {}

  logPath(date: Date = new Date()): string {
    return path.join(this.logDir, `actions-${date.toISOString().slice(0, 10)}.jsonl`);
  }

  private shouldLogTool(toolName: string): boolean {
    return this.config.mode !== 'mutations_only' || MUTATION_TOOLS.has(toolName);
  }

  async logToolCall(entry: ToolCallLogEntry): Promise<void> {
    if (!this.shouldLogTool(entry.toolName)) return;

    const output = entry.resultOutput ?? '';
    const record: Record<string, unknown> = {
      ts: new Date().toISOString(),
      sid: entry.sessionId,
      type: 'tool_call',
      tool: entry.toolName,
      params: redactKeys(entry.params),
      status: entry.status,
      duration_ms: entry.durationMs ?? 0,
    };
    if (entry.error) record.error = entry.error.slice(0, 500);
    if (this.config.includeFullResult) {
      record.result = output.slice(0, 10_000);
    } else {
      record.result_size = Buffer.byteLength(output, 'utf-8');
    }

    await this.write(record);
  }

  async logConversation(sessionId: string, role: string, content: string): Promise<void> {
    if (this.config.mode !== 'full') return;

    await this.write({
      ts: new Date().toISOString(),
      sid: sessionId,
      type: 'message',
      role,
      content_size: Buffer.byteLength(content, 'utf-8'),
      content_preview: content.slice(0, 200),
    });
  }

  private async write(record: Record<string, unknown>): Promise<void> {
    try {
      await mkdir(this.logDir, { recursive: true });
      await appendFile(this.logPath(), JSON.stringify(record) + '\n', 'utf-8');
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('Action log write failed:', errorMessage(err));
    }
  }
}
