import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { computeHmac, deriveMachineKey, hmacPayload } from './hmac.js';
import { redactSensitive } from './redact.js';
import {
  getSecurityEvents,
  initSchema,
  insertAuditLog,
  queryAuditLogs,
  type AuditLogRow,
  type AuditQuery,
} from './schema.js';
import type { RiskLevel } from '../shared/types.js';

const SUMMARY_LIMIT = 500;

export interface AuditLogOptions {
  /** File path, or ':memory:'. The parent directory is created on first use. */
  dbPath: string;
  /** Overrides the machine-derived key. */
  hmacKey?: string | Buffer;
}

export interface AuditEvent {
  eventType: string;
  sessionId?: string;
  source?: string;
  toolName?: string;
  parameters?: Record<string, unknown>;
  resultSummary?: string;
  approvalStatus?: string;
  riskLevel?: RiskLevel | '';
}

export interface ToolExecutionEvent {
  sessionId: string;
  source: string;
  toolName: string;
  parameters: Record<string, unknown>;
  approved: boolean;
  riskLevel: RiskLevel | '';
  resultSummary?: string;
}

export interface TokenUsageEvent {
  sessionId: string;
  model: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface IntegrityReport {
  total: number;
  tampered: number;
}

export interface DailyStats {
  date: string;
  totalEvents: number;
  toolCalls: number;
  approved: number;
  denied: number;
  riskDistribution: Record<RiskLevel, number>;
  topTools: { tool: string; count: number }[];
  securityEvents: number;
  hourlyActivity: number[];
}

export interface BlockedCount {
  days: number;
  dailyCounts: { date: string; approved: number; denied: number }[];
  totalBlocked: number;
  totalApproved: number;
}

export interface SecurityScore {
  score: number;
  grade: 'A' | 'B' | 'C' | 'D';
  factors: { name: string; status: 'ok' | 'warning'; detail: string }[];
  recommendations: string[];
}

function toKey(key: string | Buffer | undefined): Buffer {
  if (key === undefined) return deriveMachineKey();
  return typeof key === 'string' ? Buffer.from(key, 'utf-8') : key;
}

/**
 * Append-only audit trail. Each row carries an HMAC over its identifying
 * fields so edits made directly in the database show up in
 * {@link AuditLog.verifyIntegrity}. There is no update or delete path.
 */
export class AuditLog {
  private db: Database.Database | null = null;
  private readonly key: Buffer;

  constructor(private readonly options: AuditLogOptions) {
    this.key = toKey(options.hmacKey);
  }

  private ensureDb(): Database.Database {
    if (this.db) return this.db;

    const { dbPath } = this.options;
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath);
    if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');
    initSchema(db);
    this.db = db;
    return db;
  }

  log(event: AuditEvent): number {
    const db = this.ensureDb();

    const row = {
      timestamp: new Date().toISOString(),
      event_type: event.eventType,
      session_id: event.sessionId ?? '',
      source: event.source ?? '',
      tool_name: event.toolName ?? '',
      parameters: JSON.stringify(redactSensitive(event.parameters ?? {})),
      result_summary: (event.resultSummary ?? '').slice(0, SUMMARY_LIMIT),
      approval_status: event.approvalStatus ?? '',
      risk_level: event.riskLevel ?? '',
    };

    return insertAuditLog(db, { ...row, hmac: computeHmac(this.key, hmacPayload(row)) });
  }

  logToolExecution(event: ToolExecutionEvent): number {
    return this.log({
      eventType: 'tool_execution',
      sessionId: event.sessionId,
      source: event.source,
      toolName: event.toolName,
      parameters: event.parameters,
      approvalStatus: event.approved ? 'approved' : 'denied',
      riskLevel: event.riskLevel,
      resultSummary: event.resultSummary,
    });
  }

  logSecurityEvent(type: string, sessionId = '', details = ''): number {
    return this.log({ eventType: `security:${type}`, sessionId, resultSummary: details });
  }

  logTokenUsage(event: TokenUsageEvent): number {
    return this.log({
      eventType: 'token_usage',
      sessionId: event.sessionId,
      parameters: {
        model: event.model,
        prompt_tokens: event.promptTokens,
        completion_tokens: event.completionTokens,
        total_tokens: event.totalTokens,
      },
      resultSummary: `${event.totalTokens} tokens`,
    });
  }

  queryRecent(opts: AuditQuery = {}): AuditLogRow[] {
    return queryAuditLogs(this.ensureDb(), opts);
  }

  securityEvents(limit = 50): AuditLogRow[] {
    return getSecurityEvents(this.ensureDb(), limit);
  }

  /** Recomputes the HMAC of the newest `limit` rows. */
  verifyIntegrity(limit = 100): IntegrityReport {
    const rows = this.ensureDb()
      .prepare('SELECT * FROM audit_log ORDER BY id DESC LIMIT ?')
      .all(limit) as AuditLogRow[];

    let tampered = 0;
    for (const row of rows) {
      if (computeHmac(this.key, hmacPayload(row)) !== row.hmac) {
        tampered++;
        // eslint-disable-next-line no-console
        console.warn(`Audit tamper detected: entry ${row.id}`);
      }
    }
    return { total: rows.length, tampered };
  }

  getDailyStats(date: string = new Date().toISOString().slice(0, 10)): DailyStats {
    const db = this.ensureDb();
    const like = `${date}%`;

    const stats: DailyStats = {
      date,
      totalEvents: 0,
      toolCalls: 0,
      approved: 0,
      denied: 0,
      riskDistribution: { low: 0, medium: 0, high: 0, critical: 0 },
      topTools: [],
      securityEvents: 0,
      hourlyActivity: new Array<number>(24).fill(0),
    };

    const total = db
      .prepare('SELECT COUNT(*) AS cnt FROM audit_log WHERE timestamp LIKE ?')
      .get(like) as { cnt: number };
    stats.totalEvents = total.cnt;

    const statuses = db.prepare(`
      SELECT approval_status, COUNT(*) AS cnt FROM audit_log
      WHERE timestamp LIKE ? AND event_type = 'tool_execution'
      GROUP BY approval_status
    `).all(like) as { approval_status: string; cnt: number }[];
    for (const { approval_status, cnt } of statuses) {
      stats.toolCalls += cnt;
      if (approval_status === 'approved') stats.approved = cnt;
      else if (approval_status === 'denied') stats.denied = cnt;
    }

    const risks = db.prepare(`
      SELECT risk_level, COUNT(*) AS cnt FROM audit_log
      WHERE timestamp LIKE ? AND risk_level != ''
      GROUP BY risk_level
    `).all(like) as { risk_level: string; cnt: number }[];
    for (const { risk_level, cnt } of risks) {
      const level = risk_level.toLowerCase();
      if (level === 'low' || level === 'medium' || level === 'high' || level === 'critical') {
        stats.riskDistribution[level] = cnt;
      }
    }

    stats.topTools = (db.prepare(`
      SELECT tool_name, COUNT(*) AS cnt FROM audit_log
      WHERE timestamp LIKE ? AND tool_name != ''
      GROUP BY tool_name ORDER BY cnt DESC LIMIT 10
    `).all(like) as { tool_name: string; cnt: number }[])
      .map((r) => ({ tool: r.tool_name, count: r.cnt }));

    const security = db.prepare(`
      SELECT COUNT(*) AS cnt FROM audit_log
      WHERE timestamp LIKE ? AND event_type LIKE 'security:%'
    `).get(like) as { cnt: number };
    stats.securityEvents = security.cnt;

    const stamps = db
      .prepare('SELECT timestamp FROM audit_log WHERE timestamp LIKE ?')
      .all(like) as { timestamp: string }[];
    for (const { timestamp } of stamps) {
      const hour = parseInt(timestamp.slice(11, 13), 10);
      if (hour >= 0 && hour < 24) stats.hourlyActivity[hour]++;
    }

    return stats;
  }

  /** Approved and denied tool executions per day over the last `days` days. */
  getBlockedCount(days = 7): BlockedCount {
    const cutoff = new Date(Date.now() - days * 24 * 60 * 60 * 1000).toISOString().slice(0, 10);
    const rows = this.ensureDb().prepare(`
      SELECT substr(timestamp, 1, 10) AS day, approval_status, COUNT(*) AS cnt
      FROM audit_log
      WHERE event_type = 'tool_execution' AND substr(timestamp, 1, 10) > ?
      GROUP BY day, approval_status
      ORDER BY day ASC
    `).all(cutoff) as { day: string; approval_status: string; cnt: number }[];

    const byDay = new Map<string, { approved: number; denied: number }>();
    for (const { day, approval_status, cnt } of rows) {
      const counts = byDay.get(day) ?? { approved: 0, denied: 0 };
      if (approval_status === 'approved') counts.approved = cnt;
      else if (approval_status === 'denied') counts.denied = cnt;
      byDay.set(day, counts);
    }

    const result: BlockedCount = { days, dailyCounts: [], totalBlocked: 0, totalApproved: 0 };
    for (const [date, counts] of byDay) {
      result.dailyCounts.push({ date, ...counts });
      result.totalBlocked += counts.denied;
      result.totalApproved += counts.approved;
    }
    return result;
  }

  getSecurityScore(): SecurityScore {
    let score = 100;
    const factors: SecurityScore['factors'] = [];
    const recommendations: string[] = [];

    const { total, tampered } = this.verifyIntegrity(50);
    if (tampered > 0) {
      score -= 30;
      factors.push({ name: 'integrity', status: 'warning', detail: `${tampered}/${total} entries have invalid HMAC` });
      recommendations.push('Audit log integrity compromised - investigate immediately');
    } else {
      factors.push({ name: 'integrity', status: 'ok', detail: `All ${total} recent entries verified` });
    }

    const blocked = this.getBlockedCount(7);
    const totalOps = blocked.totalApproved + blocked.totalBlocked;
    if (totalOps > 0) {
      const denyRatio = blocked.totalBlocked / totalOps;
      const pct = `${Math.round(denyRatio * 100)}%`;
      if (denyRatio > 0.3) {
        score -= 10;
        factors.push({ name: 'deny_ratio', status: 'warning', detail: `${pct} operations denied in last 7 days` });
        recommendations.push('High denial rate - review blocked operations');
      } else {
        factors.push({ name: 'deny_ratio', status: 'ok', detail: `${pct} operations denied` });
      }
    }

    const { riskDistribution } = this.getDailyStats();
    const highRisk = riskDistribution.high + riskDistribution.critical;
    factors.push({
      name: 'high_risk_ops',
      status: highRisk > 10 ? 'warning' : 'ok',
      detail: `${highRisk} high/critical operations today`,
    });
    if (highRisk > 10) score -= 10;

    score = Math.max(0, Math.min(100, score));
    const grade = score >= 90 ? 'A' : score >= 70 ? 'B' : score >= 50 ? 'C' : 'D';
    return { score, grade, factors, recommendations };
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }
}
