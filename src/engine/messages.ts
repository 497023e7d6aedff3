import { v4 as uuidv4 } from 'uuid';
import type { ChatMessage, WireToolCall } from './model.js';
import type { Message, ToolCall } from '../shared/types.js';

export function toWireToolCall(call: ToolCall): WireToolCall {
  return {
    id: call.id,
    type: 'function',
    function: { name: call.name, arguments: JSON.stringify(call.arguments) },
  };
}

export function toWireMessage(msg: Message): ChatMessage {
  const wire: ChatMessage = { role: msg.role, content: msg.content };
  if (msg.name) wire.name = msg.name;
  if (msg.toolCallId) wire.tool_call_id = msg.toolCallId;
  if (msg.toolCalls && msg.toolCalls.length > 0) {
    wire.tool_calls = msg.toolCalls.map(toWireToolCall);
    if (!msg.content) wire.content = null;
  }
  return wire;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parseArguments(raw: unknown): Record<string, unknown> {
  if (isRecord(raw)) return raw;
  if (typeof raw !== 'string') return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : { _raw: raw };
  } catch {
    return { _raw: raw };
  }
}

/**
 * Reads a tool call from a completion response. Arguments that are not a
 * JSON object are kept under `_raw`.
 */
export function parseWireToolCall(raw: unknown): ToolCall {
  const call = isRecord(raw) ? raw : {};
  const fn = isRecord(call.function) ? call.function : {};
  return {
    id: typeof call.id === 'string' && call.id ? call.id : uuidv4(),
    name: typeof fn.name === 'string' && fn.name ? fn.name : 'unknown',
    arguments: parseArguments(fn.arguments ?? '{}'),
  };
}
