import type { Message, OpenAiTool, Session, ToolCall } from '../shared/types.js';

/** OpenAI chat wire format, which the completion layer speaks. */
export interface WireToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

export interface ChatMessage {
  role: Message['role'];
  content: string | null;
  name?: string;
  tool_call_id?: string;
  tool_calls?: WireToolCall[];
}

export interface CompletionRequest {
  messages: ChatMessage[];
  model?: string;
  tools?: OpenAiTool[];
  temperature?: number;
  maxTokens?: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ModelResponse {
  content: string | null;
  toolCalls: ToolCall[];
  model: string;
  usage?: TokenUsage;
  finishReason: string;
}

/**
 * Model completion with its own fallback chain. Rejects only once every
 * model in the chain has failed.
 */
export interface ModelCompleter {
  readonly defaultModel: string;
  complete(request: CompletionRequest): Promise<ModelResponse>;
}

export interface ContextOptions {
  corePrompt: string;
  activeSkills: string[];
}

/** Memory/RAG layer: turns a session into the message list sent to the model. */
export interface ContextBuilder {
  buildContext(session: Session, systemPrompt: string, options: ContextOptions): Promise<Message[]>;
}

export interface SessionStore {
  saveSession(session: Session): Promise<void>;
}

export interface SkillSource {
  getActiveSkills(): string[];
}
