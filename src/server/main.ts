import { AuditLog } from '../audit/audit-log.js';
import { auditDbPath, loadConfig } from '../config/config.js';
import { createControlApp } from './app.js';

const config = await loadConfig();

if (!config.server.secret) {
  // eslint-disable-next-line no-console
  console.warn('INTERNAL_SECRET is not set: every authenticated route will answer 401');
}

// Standalone reader of the audit trail. Approvals are answered through the
// control app an embedding process builds from createSteward(), whose broker
// its engine opens requests on.
const audit = new AuditLog({ dbPath: auditDbPath(config), hmacKey: config.audit.hmacKey });
const app = createControlApp({ audit, secret: config.server.secret });

const server = app.listen(config.server.port, config.server.host, () => {
  // eslint-disable-next-line no-console
  console.log(`steward audit server listening on ${config.server.host}:${config.server.port}`);
});

function shutdown(signal: string): void {
  // eslint-disable-next-line no-console
  console.log(`${signal} received, shutting down`);
  server.close(() => {
    audit.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
