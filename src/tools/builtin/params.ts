import type { z } from 'zod';

/** Parses tool arguments, returning the first issue as a readable message. */
export function parseParams<T extends z.ZodTypeAny>(
  schema: T,
  params: Record<string, unknown>,
): { ok: true; value: z.infer<T> } | { ok: false; error: string } {
  const result = schema.safeParse(params);
  if (result.success) return { ok: true, value: result.data };
  const issue = result.error.issues[0];
  const field = issue?.path.join('.') || 'params';
  return { ok: false, error: `Invalid ${field}: ${issue?.message ?? 'invalid value'}` };
}

export function truncate(text: string, max: number, marker: string): string {
  return text.length > max ? `${text.slice(0, max)}\n... (${marker})` : text;
}
