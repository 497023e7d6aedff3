import type { ToolResult } from './types.js';

export function ok(output: string, data: Record<string, unknown> = {}): ToolResult {
  return { status: 'ok', output, data };
}

export function fail(error: string, data: Record<string, unknown> = {}): ToolResult {
  return { status: 'failed', error, data };
}

export function denied(reason: string): ToolResult {
  return { status: 'denied', reason };
}

/** Text handed back to the model for a tool result. */
export function resultText(result: ToolResult): string {
  switch (result.status) {
    case 'ok':
      return result.output;
    case 'denied':
      return `Denied: ${result.reason}`;
    case 'failed':
      return result.error || 'Error';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
