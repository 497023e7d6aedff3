import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import type express from 'express';
import { ApprovalBroker } from '../../approval/broker.js';
import { AuditLog } from '../../audit/audit-log.js';
import { createControlApp } from '../app.js';
import { generateInternalToken } from '../auth.js';
import { request } from './helpers.js';

const SECRET = 'test-secret';

describe('control app', () => {
  let audit: AuditLog;
  let broker: ApprovalBroker;
  let app: express.Express;
  let token: string;

  beforeEach(() => {
    audit = new AuditLog({ dbPath: ':memory:', hmacKey: SECRET });
    broker = new ApprovalBroker();
    app = createControlApp({ broker, audit, secret: SECRET });
    token = generateInternalToken(SECRET);
  });

  afterEach(() => {
    broker.cancelAll();
    audit.close();
    vi.restoreAllMocks();
  });

  describe('auth', () => {
    it('should serve /health without a token', async () => {
      const res = await request(app, 'GET', '/health');
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ status: 'ok', pending_approvals: 0 });
    });

    it('should require a bearer token', async () => {
      const res = await request(app, 'GET', '/approvals');
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Missing authorization header' });
    });

    it('should reject tokens signed with another secret', async () => {
      const res = await request(app, 'GET', '/approvals', { token: generateInternalToken('another-test-secret') });
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Invalid token' });
    });

    it('should reject tokens from another issuer', async () => {
      const res = await request(app, 'GET', '/approvals', { token: jwt.sign({ sub: 'x' }, SECRET) });
      expect(res.status).toBe(401);
    });

    it('should reject expired tokens', async () => {
      const res = await request(app, 'GET', '/approvals', { token: generateInternalToken(SECRET, -10) });
      expect(res.status).toBe(401);
    });

    it('should accept a valid token', async () => {
      const res = await request(app, 'GET', '/approvals', { token });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ pending: [] });
    });
  });

  describe('audit routes', () => {
    beforeEach(() => {
      audit.logToolExecution({
        sessionId: 's1', source: 'cli', toolName: 'get_time', parameters: {}, approved: true, riskLevel: 'low',
      });
      audit.logToolExecution({
        sessionId: 's2', source: 'cli', toolName: 'shell_execute', parameters: {}, approved: false, riskLevel: 'high',
      });
      audit.logSecurityEvent('injection_detected', 's1', 'marker');
    });

    it('should return recent entries filtered by query', async () => {
      const all = await request(app, 'GET', '/audit', { token });
      expect(all.status).toBe(200);
      expect(all.body).toHaveLength(3);

      const filtered = await request(app, 'GET', '/audit?session_id=s1&event_type=tool_execution', { token });
      expect(filtered.body).toEqual([expect.objectContaining({ session_id: 's1', tool_name: 'get_time' })]);

      const limited = await request(app, 'GET', '/audit?limit=1', { token });
      expect(limited.body).toEqual([expect.objectContaining({ event_type: 'security:injection_detected' })]);
    });

    it('should verify integrity', async () => {
      const res = await request(app, 'GET', '/audit/verify', { token });
      expect(res.body).toEqual({ total: 3, tampered: 0 });
    });

    it('should list security events', async () => {
      const res = await request(app, 'GET', '/audit/security', { token });
      expect(res.body).toHaveLength(2);
    });

    it('should report daily stats', async () => {
      const day = new Date().toISOString().slice(0, 10);
      const res = await request(app, 'GET', `/audit/stats/${day}`, { token });
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ date: day, totalEvents: 3, approved: 1, denied: 1, securityEvents: 1 });
    });

    it('should reject malformed days', async () => {
      const res = await request(app, 'GET', '/audit/stats/yesterday', { token });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'day must be YYYY-MM-DD' });
    });

    it('should report the security score', async () => {
      const res = await request(app, 'GET', '/audit/score', { token });
      expect(res.body).toMatchObject({ score: 90, grade: 'A' });
    });
  });

  describe('without a broker', () => {
    it('should serve the audit routes only', async () => {
      const reader = createControlApp({ audit, secret: SECRET });

      const health = await request(reader, 'GET', '/health');
      expect(health.body).not.toHaveProperty('pending_approvals');

      const approvals = await request(reader, 'GET', '/approvals', { token });
      expect(approvals.status).toBe(404);
      expect(approvals.body).toEqual({ error: 'Not found' });

      const verify = await request(reader, 'GET', '/audit/verify', { token });
      expect(verify.body).toEqual({ total: 0, tampered: 0 });
    });
  });
});
