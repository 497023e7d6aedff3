import { Router } from 'express';
import type { AuditLog } from '../audit/audit-log.js';
import { errorMessage } from '../shared/result.js';

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function intParam(value: unknown, fallback: number, max: number): number {
  if (typeof value !== 'string') return fallback;
  const n = parseInt(value, 10);
  if (!Number.isFinite(n) || n < 1) return fallback;
  return Math.min(n, max);
}

function stringParam(value: unknown): string | undefined {
  return typeof value === 'string' && value ? value : undefined;
}

export function createAuditRoutes(audit: AuditLog): Router {
  const router = Router();

  router.get('/', (req, res) => {
    try {
      res.json(audit.queryRecent({
        limit: intParam(req.query.limit, 50, 1000),
        sessionId: stringParam(req.query.session_id),
        eventType: stringParam(req.query.event_type),
      }));
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  router.get('/verify', (req, res) => {
    try {
      res.json(audit.verifyIntegrity(intParam(req.query.limit, 100, 10_000)));
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  router.get('/security', (req, res) => {
    try {
      res.json(audit.securityEvents(intParam(req.query.limit, 50, 1000)));
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  router.get('/score', (_req, res) => {
    try {
      res.json(audit.getSecurityScore());
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  router.get('/stats/:day', (req, res) => {
    if (!DAY_PATTERN.test(req.params.day)) {
      res.status(400).json({ error: 'day must be YYYY-MM-DD' });
      return;
    }
    try {
      res.json(audit.getDailyStats(req.params.day));
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  return router;
}
