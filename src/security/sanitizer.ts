/**
 * Prompt-injection detection for tool output, secret masking for anything
 * headed to the model or a log, and a light touch on user input.
 */

const INJECTION_PATTERNS: readonly RegExp[] = [
  /ignore\s+(all\s+)?previous\s+instructions/i,
  /ignore\s+(all\s+)?above\s+instructions/i,
  /you\s+are\s+now\s+(?:a|an)\s+/i,
  /new\s+instructions?\s*:/i,
  /system\s*:\s*you\s+are/i,
  /forget\s+(all\s+)?previous/i,
  /disregard\s+(all\s+)?previous/i,
  /override\s+(all\s+)?previous/i,
  /\[SYSTEM\]/i,
  /\[INST\]/i,
  /<<SYS>>/i,
];

interface Redaction {
  pattern: RegExp;
  replacement: string;
}

const SECRET_PATTERNS: readonly Redaction[] = [
  { pattern: /sk-[a-zA-Z0-9]{20,}/gi, replacement: 'sk-***REDACTED***' },
  {
    pattern: /(api[_-]?key\s*[:=]\s*)['"]?[a-zA-Z0-9_-]{20,}['"]?/gi,
    replacement: '$1***REDACTED***',
  },
  { pattern: /(bearer\s+)[a-zA-Z0-9_.~+/-]{20,}=*/gi, replacement: '$1***REDACTED***' },
  {
    pattern: /(token\s*[:=]\s*)['"]?[a-zA-Z0-9_.-]{20,}['"]?/gi,
    replacement: '$1***REDACTED***',
  },
  { pattern: /(:\/\/[^:/\s@]+:)[^@\s]+@/gi, replacement: '$1***@' },
  { pattern: /AKIA[0-9A-Z]{16}/g, replacement: 'AKIA***REDACTED***' },
  {
    pattern: /-----BEGIN\s+(?:[A-Z]+\s+)?PRIVATE\s+KEY-----/gi,
    replacement: '[PRIVATE KEY REDACTED]',
  },
];

export interface InjectionCheck {
  suspicious: boolean;
  matched: string | null;
}

function redactSecrets(text: string): string {
  let result = text;
  for (const { pattern, replacement } of SECRET_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

export class Sanitizer {
  private detections = 0;

  get injectionDetections(): number {
    return this.detections;
  }

  /** Reports the first injection marker found. Never blocks. */
  checkInjection(text: string): InjectionCheck {
    for (const pattern of INJECTION_PATTERNS) {
      const match = pattern.exec(text);
      if (match) {
        this.detections++;
        // eslint-disable-next-line no-console
        console.warn(`Injection marker detected: ${pattern.source} matched "${match[0].slice(0, 50)}"`);
        return { suspicious: true, matched: match[0] };
      }
    }
    return { suspicious: false, matched: null };
  }

  sanitizeToolOutput(output: string): string {
    return redactSecrets(output);
  }

  redactForLog(value: unknown): unknown {
    if (typeof value === 'string') return redactSecrets(value);
    if (Array.isArray(value)) return value.map((item) => this.redactForLog(item));
    if (value !== null && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.redactForLog(item);
      }
      return result;
    }
    return value;
  }

  /** Strips NUL bytes and normalizes line endings; the text is otherwise untouched. */
  sanitizeUserInput(text: string): string {
    return text.replace(/\0/g, '').replace(/\r\n?/g, '\n').trim();
  }
}
