import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { expandHome } from '../../config/config.js';
import { errorMessage, fail, ok } from '../../shared/result.js';
import type { Tool, ToolContext, ToolResult } from '../../shared/types.js';
import { parseParams, truncate } from './params.js';

const FileReadParams = z.object({
  path: z.string().min(1, 'Path is required'),
  max_lines: z.number().int().positive().optional(),
});

export function fileReadTool(): Tool {
  return {
    name: 'file_read',
    description:
      'Read the contents of a file at a given path. Returns the text content of the file. ' +
      'Use this when you need to examine file contents.',
    parameters: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'The file path to read' },
        max_lines: { type: 'integer', description: 'Maximum number of lines to read (default: all)' },
      },
      required: ['path'],
    },
    riskLevel: 'low',
    sandbox: { kind: 'path', pathParams: ['path'], operation: 'read' },

    async execute(params: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
      const parsed = parseParams(FileReadParams, params);
      if (!parsed.ok) return fail(parsed.error);

      const resolved = path.resolve(expandHome(parsed.value.path));
      const info = await stat(resolved).catch(() => null);
      if (!info) return fail(`File not found: ${parsed.value.path}`);
      if (!info.isFile()) return fail(`Not a file: ${parsed.value.path}`);

      try {
        let content = await readFile(resolved, 'utf-8');
        const maxLines = parsed.value.max_lines;
        if (maxLines) {
          const lines = content.split(/(?<=\n)/);
          if (lines.length > maxLines) {
            content = lines.slice(0, maxLines).join('') + `\n... (${lines.length - maxLines} more lines)`;
          }
        }
        return ok(truncate(content, context.maxOutputSize, 'truncated'), { path: resolved, size: info.size });
      } catch (err) {
        return fail(`Error reading file: ${errorMessage(err)}`);
      }
    },
  };
}
