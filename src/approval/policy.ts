import { SessionTrust, type Clock } from './session-trust.js';
import type { SecurityConfig } from '../config/config.js';
import { isRiskAtMost } from '../shared/risk.js';
import type { ApprovalDecision, RiskLevel } from '../shared/types.js';

type PolicyRules = Pick<
  SecurityConfig,
  'autoApproveLevels' | 'requireApprovalFor' | 'sessionTrustEnabled' | 'trustTimeoutMinutes'
>;

/**
 * Decides whether a tool call runs straight away or needs a human. Owns the
 * per-session trust map; pass the policy itself to whoever needs trust.
 */
export class ApprovalPolicy {
  private readonly trusts = new Map<string, SessionTrust>();

  constructor(
    private readonly rules: PolicyRules,
    private readonly now: Clock = Date.now,
  ) {}

  private get trustTimeoutMs(): number {
    return this.rules.trustTimeoutMinutes * 60 * 1000;
  }

  getSessionTrust(sessionId: string): SessionTrust {
    let trust = this.trusts.get(sessionId);
    if (!trust) {
      trust = new SessionTrust(this.trustTimeoutMs, this.now);
      this.trusts.set(sessionId, trust);
    }
    return trust;
  }

  elevateSessionTrust(sessionId: string, level: RiskLevel): void {
    this.getSessionTrust(sessionId).elevate(level, this.trustTimeoutMs);
    // eslint-disable-next-line no-console
    console.log(
      `Trust elevated: session ${sessionId.slice(0, 8)} -> ${level} for ${this.rules.trustTimeoutMinutes} min`,
    );
  }

  check(toolName: string, riskLevel: RiskLevel, sessionId: string): ApprovalDecision {
    if (this.rules.requireApprovalFor.includes(toolName)) {
      return {
        approved: false,
        reason: `Tool '${toolName}' requires explicit approval`,
        method: 'pending',
      };
    }

    if (this.rules.autoApproveLevels.includes(riskLevel)) {
      return {
        approved: true,
        reason: `Auto-approved: ${riskLevel} is in auto-approve list`,
        method: 'auto',
      };
    }

    if (this.rules.sessionTrustEnabled) {
      // Read-only lookup: check() never adds to the map.
      const current = this.trusts.get(sessionId)?.currentLevel() ?? 'low';
      if (isRiskAtMost(riskLevel, current)) {
        return {
          approved: true,
          reason: `Session trust: ${current} covers ${riskLevel}`,
          method: 'session_trust',
        };
      }
    }

    return {
      approved: false,
      reason: `Requires approval: ${toolName} (${riskLevel})`,
      method: 'pending',
    };
  }

  /** Drops expired trust entries. Returns how many were removed. */
  cleanupExpired(): number {
    let removed = 0;
    for (const [sessionId, trust] of this.trusts) {
      if (trust.isExpired) {
        this.trusts.delete(sessionId);
        removed++;
      }
    }
    return removed;
  }

  get trackedSessions(): number {
    return this.trusts.size;
  }
}
