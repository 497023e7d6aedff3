import fs from 'node:fs';
import path from 'node:path';
import { expandHome, type SandboxConfig } from '../config/config.js';
import type { FileOperation } from '../shared/types.js';

/**
 * Always enforced, whatever the configured block-list says. Matched against
 * the lower-cased command.
 */
export const DANGEROUS_PATTERNS: readonly RegExp[] = [
  /\brm\s+(-{1,2}[a-z-]+\s+)*(\/|~\/?)(\*|\s|$)/,   // rm -rf / , rm -rf ~
  /\bformat\s+[a-z]:/,                              // format c:
  /\bdel\s+(\/[a-z]+\s+)+[a-z]:\\/,                 // del /f /s /q c:\
  /\brmdir\s+\/s\s+\/q\s+[a-z]:\\/,                 // rmdir /s /q c:\
  /\bmkfs(\.\w+)?\b/,                               // mkfs, mkfs.ext4
  /\bdd\s+.*\bof=\/dev\//,                          // dd if=... of=/dev/sda
  />\s*\/dev\/(sd[a-z]|hd[a-z]|nvme\d|disk\d)/,     // > /dev/sda
  /\bchmod\s+-r\s+777\s+\/(\s|$)/,                  // chmod -R 777 /
  /\bchown\s+-r\s+\S+\s+\/\s*$/,                    // chown -R user /
  /\b(curl|wget)\b.*\|\s*(sudo\s+)?(bash|sh|zsh|python3?|powershell)\b/, // curl ... | bash
  /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/,       // fork bomb
  /\breg\s+delete\b/,                               // registry deletion
  /\bnet\s+user\s+.*\s+\/add\b/,                    // account creation
];

export interface FileValidation {
  allowed: boolean;
  reason: string;
}

export interface CommandCheck {
  allowed: boolean;
  rule: string | null;
}

type SandboxRules = Pick<SandboxConfig, 'allowedDirectories' | 'blockedCommands'>;

function expandVars(p: string, env: NodeJS.ProcessEnv): string {
  return p.replace(/\$\{(\w+)\}|\$(\w+)/g, (match, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare ?? '';
    return env[name] ?? match;
  });
}

/**
 * Follows symlinks for the longest existing prefix of `p`, then re-attaches
 * the part that does not exist yet.
 */
function realpathLenient(p: string): string {
  const missing: string[] = [];
  let current = p;
  for (;;) {
    try {
      const real = fs.realpathSync.native(current);
      return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
    } catch {
      const parent = path.dirname(current);
      if (parent === current) return p;
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

function isWithin(target: string, dir: string): boolean {
  const rel = path.relative(dir, target);
  if (rel === '..' || rel.startsWith(`..${path.sep}`)) return false;
  return !path.isAbsolute(rel);
}

export class Sandbox {
  private resolvedDirs: string[] | null = null;

  constructor(
    private readonly rules: SandboxRules,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  /** Allow-listed directories, expanded and resolved once. */
  get allowedDirectories(): string[] {
    if (this.resolvedDirs === null) {
      const dirs = new Set<string>();
      for (const d of this.rules.allowedDirectories) {
        const logical = this.logicalPath(d);
        dirs.add(logical);
        dirs.add(realpathLenient(logical));
      }
      this.resolvedDirs = [...dirs];
    }
    return this.resolvedDirs;
  }

  /**
   * With no allow-list every path is allowed. Otherwise both the path as
   * written and its symlink-resolved target must sit under an allowed dir.
   */
  isPathAllowed(target: string): boolean {
    if (this.rules.allowedDirectories.length === 0) return true;
    const logical = this.logicalPath(target);
    return this.withinAllowed(logical) && this.withinAllowed(realpathLenient(logical));
  }

  isCommandAllowed(command: string): boolean {
    return this.checkCommand(command).allowed;
  }

  checkCommand(command: string): CommandCheck {
    const lower = command.toLowerCase().trim();

    for (const blocked of this.rules.blockedCommands) {
      if (blocked && lower.includes(blocked.toLowerCase())) {
        // eslint-disable-next-line no-console
        console.warn(`Command blocked: "${command.slice(0, 100)}" matched rule "${blocked}"`);
        return { allowed: false, rule: blocked };
      }
    }

    for (const pattern of DANGEROUS_PATTERNS) {
      if (pattern.test(lower)) {
        // eslint-disable-next-line no-console
        console.warn(`Command blocked: "${command.slice(0, 100)}" matched pattern ${pattern.source}`);
        return { allowed: false, rule: pattern.source };
      }
    }

    return { allowed: true, rule: null };
  }

  validateFileOperation(target: string, operation: FileOperation = 'read'): FileValidation {
    if (this.rules.allowedDirectories.length > 0) {
      const logical = this.logicalPath(target);
      if (!this.withinAllowed(logical)) {
        return {
          allowed: false,
          reason: `Path not in allowed directories: ${this.rules.allowedDirectories.join(', ')}`,
        };
      }
      if (!this.withinAllowed(realpathLenient(logical))) {
        return { allowed: false, reason: 'Symlink target is outside allowed directories' };
      }
    }

    if (operation === 'write' || operation === 'create') {
      const parent = path.dirname(this.logicalPath(target));
      if (!fs.existsSync(parent)) {
        return { allowed: false, reason: `Parent directory does not exist: ${parent}` };
      }
    }

    return { allowed: true, reason: 'OK' };
  }

  private logicalPath(p: string): string {
    return path.resolve(expandHome(expandVars(p, this.env)));
  }

  private withinAllowed(p: string): boolean {
    return this.allowedDirectories.some((dir) => isWithin(p, dir));
  }
}
