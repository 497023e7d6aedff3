import { appendFile, mkdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { expandHome } from '../../config/config.js';
import { errorMessage, fail, ok } from '../../shared/result.js';
import type { Tool, ToolResult } from '../../shared/types.js';
import { parseParams } from './params.js';

const FileWriteParams = z.object({
  path: z.string().min(1, 'Path is required'),
  content: z.string(),
  append: z.boolean().default(false),
});

export function fileWriteTool(): Tool {
  return {
    name: 'file_write',
    description:
      "Write text content to a file. Creates the file if it doesn't exist, or overwrites it if it does. " +
      "Use 'append' mode to add to existing content.",
    parameters: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'The file path to write to' },
        content: { type: 'string', description: 'The text content to write' },
        append: {
          type: 'boolean',
          description: 'If true, append to existing file instead of overwriting (default: false)',
        },
      },
      required: ['path', 'content'],
    },
    riskLevel: 'medium',
    sandbox: { kind: 'path', pathParams: ['path'], operation: 'write' },

    async execute(params: Record<string, unknown>): Promise<ToolResult> {
      const parsed = parseParams(FileWriteParams, params);
      if (!parsed.ok) return fail(parsed.error);

      const { content, append } = parsed.value;
      const resolved = path.resolve(expandHome(parsed.value.path));

      try {
        await mkdir(path.dirname(resolved), { recursive: true });
      } catch (err) {
        return fail(`Cannot create directory: ${errorMessage(err)}`);
      }

      try {
        if (append) await appendFile(resolved, content, 'utf-8');
        else await writeFile(resolved, content, 'utf-8');
        const { size } = await stat(resolved);
        const action = append ? 'appended to' : 'written to';
        return ok(`Successfully ${action} ${resolved} (${size} bytes)`, { path: resolved, size });
      } catch (err) {
        return fail(`Error writing file: ${errorMessage(err)}`);
      }
    },
  };
}
