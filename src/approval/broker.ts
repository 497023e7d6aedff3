import { v4 as uuidv4 } from 'uuid';
import type { RiskLevel } from '../shared/types.js';

export type ApprovalState = 'pending' | 'approved' | 'rejected' | 'timed_out';

export type ApprovalAnswer = 'approve' | 'deny' | { trust: RiskLevel };

export interface ApprovalRequest {
  toolName: string;
  params: Record<string, unknown>;
  riskLevel: RiskLevel;
  sessionId: string;
  reason?: string;
}

export interface PendingApproval extends ApprovalRequest {
  id: string;
  requestedAt: string;
  expiresAt: string;
}

export interface ApprovalOutcome {
  id: string;
  state: Exclude<ApprovalState, 'pending'>;
  approved: boolean;
  resolvedBy: string;
  resolvedAt: string;
  /** Set when the answer was "trust this level". */
  trustLevel?: RiskLevel;
}

export interface OpenedApproval {
  id: string;
  outcome: Promise<ApprovalOutcome>;
}

interface Entry {
  request: PendingApproval;
  settle: (outcome: ApprovalOutcome) => void;
  timer: NodeJS.Timeout;
}

/**
 * Correlates an approval prompt with the one answer that settles it. Each
 * entry is settled exactly once, by an answer, by its timeout (denied) or by
 * cancelAll(), and is removed when settled.
 */
export class ApprovalBroker {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly defaultTimeoutMs = 60_000) {}

  open(request: ApprovalRequest, timeoutMs = this.defaultTimeoutMs): OpenedApproval {
    const id = uuidv4();
    const requestedAt = new Date();
    const pending: PendingApproval = {
      ...request,
      id,
      requestedAt: requestedAt.toISOString(),
      expiresAt: new Date(requestedAt.getTime() + timeoutMs).toISOString(),
    };

    const outcome = new Promise<ApprovalOutcome>((resolve) => {
      const timer = setTimeout(() => {
        // eslint-disable-next-line no-console
        console.warn(`Approval ${id} timed out after ${timeoutMs}ms (${request.toolName})`);
        this.settle(id, { state: 'timed_out', approved: false, resolvedBy: 'timeout' });
      }, timeoutMs);
      this.entries.set(id, { request: pending, settle: resolve, timer });
    });

    return { id, outcome };
  }

  /**
   * Applies an answer from any transport. Throws when the id is unknown or
   * already settled.
   */
  resolve(id: string, answer: ApprovalAnswer, resolvedBy: string): ApprovalOutcome {
    if (!this.entries.has(id)) throw new Error(`Approval ${id} not found or already resolved`);

    if (answer === 'deny') {
      return this.settle(id, { state: 'rejected', approved: false, resolvedBy });
    }
    if (answer === 'approve') {
      return this.settle(id, { state: 'approved', approved: true, resolvedBy });
    }
    return this.settle(id, { state: 'approved', approved: true, resolvedBy, trustLevel: answer.trust });
  }

  get(id: string): PendingApproval | null {
    return this.entries.get(id)?.request ?? null;
  }

  list(): PendingApproval[] {
    return [...this.entries.values()].map((e) => e.request);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Denies every pending request, e.g. on shutdown. */
  cancelAll(resolvedBy = 'shutdown'): number {
    const ids = [...this.entries.keys()];
    for (const id of ids) {
      this.settle(id, { state: 'rejected', approved: false, resolvedBy });
    }
    return ids.length;
  }

  private settle(
    id: string,
    result: Omit<ApprovalOutcome, 'id' | 'resolvedAt'>,
  ): ApprovalOutcome {
    const outcome: ApprovalOutcome = { id, ...result, resolvedAt: new Date().toISOString() };
    const entry = this.entries.get(id);
    if (!entry) return outcome;
    this.entries.delete(id);
    clearTimeout(entry.timer);
    entry.settle(outcome);
    return outcome;
  }
}
