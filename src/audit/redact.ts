const SENSITIVE_KEY_PARTS = [
  'api_key', 'api-key', 'apikey', 'password', 'passwd',
  'secret', 'token', 'credential', 'auth_token',
  'access_key', 'private_key',
];

const KEY_PREFIXES = ['sk-', 'pk-', 'api-', 'token-'];

const MASK = '***';

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  // Counts such as prompt_tokens are not credentials.
  if (lower.endsWith('_tokens')) return false;
  return SENSITIVE_KEY_PARTS.some((part) => lower.includes(part));
}

function redactString(value: string): string {
  if (value.length > 20 && KEY_PREFIXES.some((prefix) => value.startsWith(prefix))) {
    return value.slice(0, 6) + MASK;
  }
  return value;
}

/** Masks secret-looking keys and key-shaped strings, at any depth. */
export function redactSensitive(value: unknown): unknown {
  if (typeof value === 'string') return redactString(value);
  if (Array.isArray(value)) return value.map(redactSensitive);
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = isSensitiveKey(key) ? MASK : redactSensitive(item);
    }
    return result;
  }
  return value;
}
