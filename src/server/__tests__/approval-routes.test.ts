import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import express from 'express';
import { ApprovalBroker, type ApprovalRequest } from '../../approval/broker.js';
import { createApprovalRoutes } from '../approval-routes.js';
import { request } from './helpers.js';

const shellRequest: ApprovalRequest = {
  toolName: 'shell_execute',
  params: { command: 'ls' },
  riskLevel: 'high',
  sessionId: 's1',
};

function createTestApp(broker: ApprovalBroker): express.Express {
  const app = express();
  app.use(express.json());
  app.use('/approvals', createApprovalRoutes(broker));
  return app;
}

describe('approval-routes', () => {
  let broker: ApprovalBroker;
  let app: express.Express;

  beforeEach(() => {
    broker = new ApprovalBroker();
    app = createTestApp(broker);
  });

  afterEach(() => {
    broker.cancelAll();
    vi.restoreAllMocks();
  });

  describe('GET /approvals', () => {
    it('should list pending requests', async () => {
      const { id } = broker.open(shellRequest);

      const res = await request(app, 'GET', '/approvals');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ pending: [expect.objectContaining({ id, toolName: 'shell_execute', riskLevel: 'high' })] });
    });
  });

  describe('GET /approvals/:id', () => {
    it('should return the request', async () => {
      const { id } = broker.open(shellRequest);
      const res = await request(app, 'GET', `/approvals/${id}`);
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id, sessionId: 's1', params: { command: 'ls' } });
    });

    it('should return 404 for unknown id', async () => {
      const res = await request(app, 'GET', '/approvals/nonexistent');
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Approval not found' });
    });
  });

  describe('POST /approvals/:id/resolve', () => {
    it('should approve and wake the waiting caller', async () => {
      const { id, outcome } = broker.open(shellRequest);

      const res = await request(app, 'POST', `/approvals/${id}/resolve`, {
        body: { decision: 'approve', resolved_by: 'alice' },
      });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id, state: 'approved', approved: true, resolvedBy: 'alice' });
      await expect(outcome).resolves.toMatchObject({ approved: true });
      expect(broker.size).toBe(0);
    });

    it('should deny with a default resolver name', async () => {
      const { id } = broker.open(shellRequest);
      const res = await request(app, 'POST', `/approvals/${id}/resolve`, { body: { decision: 'deny' } });
      expect(res.body).toMatchObject({ state: 'rejected', approved: false, resolvedBy: 'control-api' });
    });

    it('should carry a trust level', async () => {
      const { id, outcome } = broker.open(shellRequest);
      const res = await request(app, 'POST', `/approvals/${id}/resolve`, {
        body: { decision: 'trust', trust_level: 'high' },
      });
      expect(res.body).toMatchObject({ state: 'approved', trustLevel: 'high' });
      await expect(outcome).resolves.toMatchObject({ trustLevel: 'high' });
    });

    it('should reject trust without a level', async () => {
      const { id } = broker.open(shellRequest);
      const res = await request(app, 'POST', `/approvals/${id}/resolve`, { body: { decision: 'trust' } });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'trust_level: trust_level is required when decision is trust' });
      expect(broker.get(id)).not.toBeNull();
    });

    it('should reject unknown decisions', async () => {
      const { id } = broker.open(shellRequest);
      const res = await request(app, 'POST', `/approvals/${id}/resolve`, { body: { decision: 'maybe' } });
      expect(res.status).toBe(400);
    });

    it('should return 404 for unknown or already answered ids', async () => {
      const { id } = broker.open(shellRequest);
      await request(app, 'POST', `/approvals/${id}/resolve`, { body: { decision: 'approve' } });

      const again = await request(app, 'POST', `/approvals/${id}/resolve`, { body: { decision: 'deny' } });
      expect(again.status).toBe(404);
      expect(again.body).toEqual({ error: 'Approval not found or already resolved' });

      const missing = await request(app, 'POST', '/approvals/nonexistent/resolve', { body: { decision: 'approve' } });
      expect(missing.status).toBe(404);
    });
  });
});
