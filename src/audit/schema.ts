import type Database from 'better-sqlite3';

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS audit_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL,
      event_type TEXT NOT NULL,
      session_id TEXT NOT NULL DEFAULT '',
      source TEXT NOT NULL DEFAULT '',
      tool_name TEXT NOT NULL DEFAULT '',
      parameters TEXT NOT NULL DEFAULT '{}',
      result_summary TEXT NOT NULL DEFAULT '',
      approval_status TEXT NOT NULL DEFAULT '',
      risk_level TEXT NOT NULL DEFAULT '',
      hmac TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_log(timestamp);
    CREATE INDEX IF NOT EXISTS idx_audit_session ON audit_log(session_id);
    CREATE INDEX IF NOT EXISTS idx_audit_tool ON audit_log(tool_name);

    CREATE VIEW IF NOT EXISTS security_events AS
    SELECT * FROM audit_log
    WHERE event_type LIKE 'security:%' OR approval_status = 'denied'
    ORDER BY id DESC;
  `);
}

export interface AuditLogRow {
  id: number;
  timestamp: string;
  event_type: string;
  session_id: string;
  source: string;
  tool_name: string;
  parameters: string;
  result_summary: string;
  approval_status: string;
  risk_level: string;
  hmac: string;
}

export type NewAuditLogRow = Omit<AuditLogRow, 'id'>;

export function insertAuditLog(db: Database.Database, row: NewAuditLogRow): number {
  const info = db.prepare(`
    INSERT INTO audit_log (timestamp, event_type, session_id, source, tool_name,
      parameters, result_summary, approval_status, risk_level, hmac)
    VALUES (@timestamp, @event_type, @session_id, @source, @tool_name,
      @parameters, @result_summary, @approval_status, @risk_level, @hmac)
  `).run(row);
  return Number(info.lastInsertRowid);
}

export interface AuditQuery {
  limit?: number;
  sessionId?: string;
  eventType?: string;
}

export function queryAuditLogs(db: Database.Database, opts: AuditQuery): AuditLogRow[] {
  let query = 'SELECT * FROM audit_log WHERE 1=1';
  const params: unknown[] = [];

  if (opts.sessionId) {
    query += ' AND session_id = ?';
    params.push(opts.sessionId);
  }
  if (opts.eventType) {
    query += ' AND event_type = ?';
    params.push(opts.eventType);
  }

  query += ' ORDER BY id DESC LIMIT ?';
  params.push(opts.limit ?? 50);

  return db.prepare(query).all(...params) as AuditLogRow[];
}

export function getSecurityEvents(db: Database.Database, limit = 50): AuditLogRow[] {
  return db.prepare('SELECT * FROM security_events LIMIT ?').all(limit) as AuditLogRow[];
}
