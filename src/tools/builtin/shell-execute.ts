import { spawn } from 'node:child_process';
import { stat } from 'node:fs/promises';
import os from 'node:os';
import type { Readable } from 'node:stream';
import { z } from 'zod';
import { expandHome } from '../../config/config.js';
import { fail, ok } from '../../shared/result.js';
import type { Tool, ToolContext, ToolResult } from '../../shared/types.js';
import { parseParams, truncate } from './params.js';

const ShellParams = z.object({
  command: z.string().min(1, 'Command is required'),
  working_directory: z.string().optional(),
});

type RunOutcome =
  | { kind: 'exited'; code: number | null; signal: NodeJS.Signals | null; stdout: string; stderr: string }
  | { kind: 'timed_out' }
  | { kind: 'error'; message: string };

/** Keeps the first `limit` characters of a stream and drains the rest. */
function collect(stream: Readable, limit: number): () => string {
  let text = '';
  stream.setEncoding('utf-8');
  stream.on('data', (chunk: string) => {
    if (text.length <= limit) text += chunk.slice(0, limit + 1 - text.length);
  });
  return () => text;
}

function shellInvocation(command: string): [string, string[]] {
  return process.platform === 'win32'
    ? ['powershell.exe', ['-NoProfile', '-Command', command]]
    : ['/bin/sh', ['-c', command]];
}

function run(command: string, cwd: string, timeoutMs: number, limit: number): Promise<RunOutcome> {
  const [file, args] = shellInvocation(command);
  return new Promise((resolve) => {
    let settled = false;
    const settle = (outcome: RunOutcome) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(outcome);
    };

    const child = spawn(file, args, { cwd, windowsHide: true, stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout = collect(child.stdout, limit);
    const stderr = collect(child.stderr, Math.floor(limit / 4));

    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      settle({ kind: 'timed_out' });
    }, timeoutMs);

    child.on('error', (err) => settle({ kind: 'error', message: err.message }));
    child.on('close', (code, signal) =>
      settle({ kind: 'exited', code, signal, stdout: stdout(), stderr: stderr() }),
    );
  });
}

export function shellExecuteTool(): Tool {
  return {
    name: 'shell_execute',
    description:
      'Execute a shell command and return its stdout/stderr output. ' +
      'On Windows this uses PowerShell, on Linux/macOS it uses sh. ' +
      'Commands are subject to sandbox restrictions.',
    parameters: {
      type: 'object',
      properties: {
        command: { type: 'string', description: 'The shell command to execute' },
        working_directory: {
          type: 'string',
          description: 'Working directory for the command (default: user home)',
        },
      },
      required: ['command'],
    },
    riskLevel: 'high',
    sandbox: { kind: 'shell', commandParam: 'command' },

    async execute(params: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
      const parsed = parseParams(ShellParams, params);
      if (!parsed.ok) return fail(parsed.error);

      const { command, working_directory } = parsed.value;
      const cwd = working_directory
        ? expandHome(working_directory)
        : context.workingDirectory ?? os.homedir();

      const dir = await stat(cwd).catch(() => null);
      if (!dir?.isDirectory()) return fail(`Working directory not found: ${cwd}`);

      const max = context.maxOutputSize;
      const outcome = await run(command, cwd, context.maxExecutionMs, max);

      if (outcome.kind === 'timed_out') {
        return fail(`Command timed out after ${context.maxExecutionMs / 1000} seconds`);
      }
      if (outcome.kind === 'error') return fail(`Execution error: ${outcome.message}`);
      if (outcome.code === null) return fail(`Execution error: terminated by ${outcome.signal ?? 'signal'}`);

      const parts: string[] = [];
      const out = truncate(outcome.stdout, max, 'output truncated');
      const err = truncate(outcome.stderr, Math.floor(max / 4), 'stderr truncated');
      if (out) parts.push(out);
      if (err) parts.push(`[STDERR]\n${err}`);
      const output = parts.join('\n') || '(no output)';

      const exitCode = outcome.code;
      if (exitCode !== 0) return ok(`[Exit code: ${exitCode}]\n${output}`, { exit_code: exitCode });
      return ok(output, { exit_code: 0 });
    },
  };
}
