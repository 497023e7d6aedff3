export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';

export type Role = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface Message {
  role: Role;
  content: string;
  name?: string;
  toolCallId?: string;
  toolCalls?: ToolCall[];
  timestamp: string;
}

export interface Session {
  id: string;
  adapter: string;
  userId: string;
  messages: Message[];
  metadata: Record<string, unknown>;
  /** Refreshed from the approval policy at the start of each turn and before each approval check. */
  trustLevel: RiskLevel;
  createdAt: string;
}

export type ToolResult =
  | { status: 'ok'; output: string; data: Record<string, unknown> }
  | { status: 'denied'; reason: string }
  | { status: 'failed'; error: string; data: Record<string, unknown> };

export interface ToolContext {
  sessionId: string;
  workingDirectory?: string;
  allowedDirectories: string[];
  maxExecutionMs: number;
  maxOutputSize: number;
}

export type ApprovalMethod = 'auto' | 'session_trust' | 'pending';

export interface ApprovalDecision {
  approved: boolean;
  reason: string;
  method: ApprovalMethod;
}

export type FileOperation = 'read' | 'write' | 'create';

/**
 * Which sandbox layer guards a tool. Every tool states one; `none` is an
 * explicit opt-out for tools with no filesystem or shell surface.
 */
export type SandboxRule =
  | { kind: 'shell'; commandParam: string }
  | { kind: 'path'; pathParams: string[]; operation: FileOperation }
  | { kind: 'none' };

export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
  readonly riskLevel: RiskLevel;
  readonly sandbox: SandboxRule;
  execute(params: Record<string, unknown>, context: ToolContext): Promise<ToolResult>;
}

export interface OpenAiTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}
