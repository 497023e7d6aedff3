import { z } from 'zod';
import { fail, ok } from '../../shared/result.js';
import type { Tool, ToolResult } from '../../shared/types.js';
import { parseParams } from './params.js';

const DAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

const TimeParams = z.object({
  timezone_offset: z.number().min(-14).max(14).optional(),
});

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

function formatOffset(hours: number): string {
  return `UTC${hours >= 0 ? '+' : ''}${hours}`;
}

/**
 * Renders `now` in the given UTC offset, or in local time when the offset is
 * omitted. Exported for tests.
 */
export function describeTime(now: Date, offsetHours?: number): string {
  let fields: { y: number; mo: number; d: number; h: number; mi: number; s: number; day: number };
  let label: string;

  if (offsetHours === undefined) {
    fields = {
      y: now.getFullYear(), mo: now.getMonth() + 1, d: now.getDate(),
      h: now.getHours(), mi: now.getMinutes(), s: now.getSeconds(), day: now.getDay(),
    };
    label = Intl.DateTimeFormat().resolvedOptions().timeZone || 'local';
  } else {
    const shifted = new Date(now.getTime() + offsetHours * 3_600_000);
    fields = {
      y: shifted.getUTCFullYear(), mo: shifted.getUTCMonth() + 1, d: shifted.getUTCDate(),
      h: shifted.getUTCHours(), mi: shifted.getUTCMinutes(), s: shifted.getUTCSeconds(), day: shifted.getUTCDay(),
    };
    label = formatOffset(offsetHours);
  }

  return [
    `Date: ${fields.y}-${pad(fields.mo)}-${pad(fields.d)}`,
    `Time: ${pad(fields.h)}:${pad(fields.mi)}:${pad(fields.s)}`,
    `Day: ${DAYS[fields.day]}`,
    `Timezone: ${label}`,
  ].join('\n');
}

export function getTimeTool(clock: () => Date = () => new Date()): Tool {
  return {
    name: 'get_time',
    description:
      'Get the current date, time, day of week, and timezone. ' +
      'Use this when the user asks what time or date it is.',
    parameters: {
      type: 'object',
      properties: {
        timezone_offset: {
          type: 'number',
          description: 'UTC offset in hours (e.g., 8 for UTC+8, -5 for UTC-5). Defaults to local system time if omitted.',
        },
      },
      required: [],
    },
    riskLevel: 'low',
    sandbox: { kind: 'none' },

    async execute(params: Record<string, unknown>): Promise<ToolResult> {
      const parsed = parseParams(TimeParams, params);
      if (!parsed.ok) return fail(`Invalid timezone offset: ${String(params.timezone_offset)}`);
      return ok(describeTime(clock(), parsed.value.timezone_offset));
    },
  };
}
