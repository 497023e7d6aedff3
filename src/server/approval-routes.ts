import { Router } from 'express';
import { z } from 'zod';
import type { ApprovalAnswer, ApprovalBroker } from '../approval/broker.js';
import { errorMessage } from '../shared/result.js';

const RISK_LEVELS = ['low', 'medium', 'high', 'critical'] as const;

const ResolveBody = z
  .object({
    decision: z.enum(['approve', 'deny', 'trust']),
    trust_level: z.enum(RISK_LEVELS).optional(),
    resolved_by: z.string().min(1).max(200).optional(),
  })
  .refine((body) => body.decision !== 'trust' || body.trust_level !== undefined, {
    message: 'trust_level is required when decision is trust',
    path: ['trust_level'],
  });

export function createApprovalRoutes(broker: ApprovalBroker): Router {
  const router = Router();

  // GET /approvals — requests still waiting for an answer
  router.get('/', (_req, res) => {
    res.json({ pending: broker.list() });
  });

  // GET /approvals/:id
  router.get('/:id', (req, res) => {
    const request = broker.get(req.params.id);
    if (!request) {
      res.status(404).json({ error: 'Approval not found' });
      return;
    }
    res.json(request);
  });

  // POST /approvals/:id/resolve — approve, deny, or approve and trust a risk level
  router.post('/:id/resolve', (req, res) => {
    const parsed = ResolveBody.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      res.status(400).json({ error: issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid body' });
      return;
    }

    const { id } = req.params;
    if (!broker.get(id)) {
      res.status(404).json({ error: 'Approval not found or already resolved' });
      return;
    }

    const { decision, trust_level, resolved_by } = parsed.data;
    let answer: ApprovalAnswer;
    if (decision === 'trust' && trust_level) answer = { trust: trust_level };
    else answer = decision === 'deny' ? 'deny' : 'approve';

    try {
      res.json(broker.resolve(id, answer, resolved_by ?? 'control-api'));
    } catch (err) {
      res.status(404).json({ error: errorMessage(err) });
    }
  });

  return router;
}
