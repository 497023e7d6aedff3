import type { ApprovalBroker, PendingApproval } from './broker.js';
import type { ApprovalPolicy } from './policy.js';
import { errorMessage } from '../shared/result.js';
import type { RiskLevel, Session } from '../shared/types.js';

/** Turns a pending approval into a human decision. Resolves true to run the tool. */
export type ApprovalCallback = (
  toolName: string,
  params: Record<string, unknown>,
  riskLevel: RiskLevel,
  session: Session,
) => Promise<boolean>;

/** Used when no adapter has supplied one: LOW runs, everything else is refused. */
export const defaultApprovalCallback: ApprovalCallback = async (_toolName, _params, riskLevel) =>
  riskLevel === 'low';

/** Delivers the prompt to the user: a button message, an email, a terminal line. */
export type ApprovalNotifier = (request: PendingApproval, session: Session) => Promise<void>;

export interface BrokeredApprovalOptions {
  broker: ApprovalBroker;
  policy: ApprovalPolicy;
  notify: ApprovalNotifier;
  timeoutMs?: number;
}

export function createBrokeredApprovalCallback(options: BrokeredApprovalOptions): ApprovalCallback {
  const { broker, policy, notify, timeoutMs } = options;

  return async (toolName, params, riskLevel, session) => {
    const { id, outcome } = broker.open(
      { toolName, params, riskLevel, sessionId: session.id },
      timeoutMs,
    );

    const request = broker.get(id);
    if (request) {
      try {
        await notify(request, session);
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error(`Approval notification failed for ${id}:`, errorMessage(err));
        if (broker.get(id)) broker.resolve(id, 'deny', 'notify-failed');
      }
    }

    const result = await outcome;
    if (result.trustLevel) {
      policy.elevateSessionTrust(session.id, result.trustLevel);
      session.trustLevel = result.trustLevel;
    }
    return result.approved;
  };
}
