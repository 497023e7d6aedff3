import { v4 as uuidv4 } from 'uuid';
import type { Message, Role, Session, ToolCall } from './types.js';

export function createSession(init: Partial<Pick<Session, 'id' | 'adapter' | 'userId' | 'metadata'>> = {}): Session {
  return {
    id: init.id ?? uuidv4(),
    adapter: init.adapter ?? 'cli',
    userId: init.userId ?? 'local',
    messages: [],
    metadata: init.metadata ?? {},
    trustLevel: 'low',
    createdAt: new Date().toISOString(),
  };
}

export function createMessage(
  role: Role,
  content: string,
  extra: { name?: string; toolCallId?: string; toolCalls?: ToolCall[] } = {},
): Message {
  return { role, content, ...extra, timestamp: new Date().toISOString() };
}
