import { describe, it, expect } from 'vitest';
import { createMessage, parseWireToolCall, toWireMessage, toWireToolCall } from '../index.js';

describe('package exports', () => {
  it('should expose the wire mapping for completion layers', () => {
    const call = parseWireToolCall({ id: 'c1', function: { name: 'echo', arguments: '{"text":"hi"}' } });
    expect(call).toEqual({ id: 'c1', name: 'echo', arguments: { text: 'hi' } });
    expect(toWireToolCall(call)).toEqual({
      id: 'c1',
      type: 'function',
      function: { name: 'echo', arguments: '{"text":"hi"}' },
    });
    expect(toWireMessage(createMessage('user', 'hi'))).toEqual({ role: 'user', content: 'hi' });
  });
});
