import type { RiskLevel } from '../shared/types.js';

export type Clock = () => number;

/**
 * A time-boxed raise of the risk ceiling a session may run without asking.
 * Expiry is checked on read; nothing runs in the background.
 */
export class SessionTrust {
  private level: RiskLevel = 'low';
  private grantedAt: number | null = null;

  constructor(
    private timeoutMs: number,
    private readonly now: Clock = Date.now,
  ) {}

  get isExpired(): boolean {
    if (this.grantedAt === null) return true;
    return this.now() - this.grantedAt > this.timeoutMs;
  }

  elevate(level: RiskLevel, timeoutMs?: number): void {
    this.level = level;
    this.grantedAt = this.now();
    if (timeoutMs !== undefined) this.timeoutMs = timeoutMs;
  }

  currentLevel(): RiskLevel {
    if (this.isExpired) {
      this.level = 'low';
      this.grantedAt = null;
    }
    return this.level;
  }

  /** Null until granted, and again once the grant has expired. */
  get grantedAtMs(): number | null {
    return this.grantedAt;
  }
}
