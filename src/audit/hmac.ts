import { createHash, createHmac } from 'node:crypto';
import os from 'node:os';

function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    return process.env.USER ?? process.env.USERNAME ?? 'unknown';
  }
}

/**
 * Key derived from user@host. Catches casual edits to the database, not an
 * attacker who can read this code and the machine name.
 */
export function deriveMachineKey(): Buffer {
  return createHash('sha256').update(`${currentUser()}@${os.hostname()}`).digest();
}

export function computeHmac(key: Buffer, data: string): string {
  return createHmac('sha256', key).update(data).digest('hex').slice(0, 16);
}

export interface HmacFields {
  timestamp: string;
  event_type: string;
  session_id: string;
  tool_name: string;
  parameters: string;
  approval_status: string;
}

export function hmacPayload(row: HmacFields): string {
  return [
    row.timestamp,
    row.event_type,
    row.session_id,
    row.tool_name,
    row.parameters,
    row.approval_status,
  ].join('|');
}
