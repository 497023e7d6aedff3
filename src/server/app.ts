import express from 'express';
import type { ApprovalBroker } from '../approval/broker.js';
import type { AuditLog } from '../audit/audit-log.js';
import { createApprovalRoutes } from './approval-routes.js';
import { createAuditRoutes } from './audit-routes.js';
import { verifyInternalToken } from './auth.js';

export interface ControlAppOptions {
  /** The broker the engine's approval callback opens requests on. Without one, only audit routes are served. */
  broker?: ApprovalBroker;
  audit: AuditLog;
  secret: string;
}

/** Local control API: answers approvals and reads the audit trail. */
export function createControlApp(options: ControlAppOptions): express.Express {
  const app = express();
  app.use(express.json());

  const startTime = Date.now();

  const { broker } = options;

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptime_s: Math.floor((Date.now() - startTime) / 1000),
      ...(broker ? { pending_approvals: broker.size } : {}),
    });
  });

  app.use(verifyInternalToken(options.secret));

  if (broker) app.use('/approvals', createApprovalRoutes(broker));
  app.use('/audit', createAuditRoutes(options.audit));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
