import type BetterSqlite3 from "better-sqlite3";
import { logger } from "../config/logger.js";
import { openDatabase } from "./db.js";

export type EventLevel = "info" | "warn" | "error" | "debug";

export interface DispatchEventInput {
  readonly traceId: string;
  readonly eventType: string;
  readonly message: string;
  readonly handler?: string;
  readonly status?: string;
  readonly metadata?: Record<string, unknown>;
  readonly level?: EventLevel;
}

export interface DispatchEventRow {
  readonly id: number;
  readonly trace_id: string;
  readonly handler: string | null;
  readonly event_type: string;
  readonly status: string | null;
  readonly message: string;
  readonly metadata: string | null;
  readonly level: EventLevel;
  readonly created_at: string;
}

/** One `process` call, reconstructed from its route and outcome events. */
export interface RouteSummaryRow {
  readonly trace_id: string;
  readonly started_at: string;
  readonly finished_at: string;
  readonly task_count: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly handlers: string | null;
}

export interface HandlerOutcomeCountRow {
  readonly handler: string;
  readonly status: string;
  readonly total: number;
}

export function emitDispatchEvent(
  db: BetterSqlite3.Database,
  event: DispatchEventInput,
): number {
  const metadataJson = event.metadata ? JSON.stringify(event.metadata) : null;

  const result = db.prepare(
    `INSERT INTO dispatch_events (trace_id, handler, event_type, status, message, metadata, level)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    event.traceId,
    event.handler ?? null,
    event.eventType,
    event.status ?? null,
    event.message,
    metadataJson,
    event.level ?? "info",
  );

  return Number(result.lastInsertRowid);
}

export function getEventsByTraceId(
  db: BetterSqlite3.Database,
  traceId: string,
): readonly DispatchEventRow[] {
  return db.prepare(
    `SELECT id, trace_id, handler, event_type, status, message, metadata, level, created_at
     FROM dispatch_events
     WHERE trace_id = ?
     ORDER BY id ASC`,
  ).all(traceId) as DispatchEventRow[];
}

export function getRecentRoutes(
  db: BetterSqlite3.Database,
  limit: number = 20,
): readonly RouteSummaryRow[] {
  return db.prepare(
    `SELECT
       trace_id,
       MIN(created_at) AS started_at,
       MAX(created_at) AS finished_at,
       SUM(CASE WHEN event_type = 'task:outcome' THEN 1 ELSE 0 END) AS task_count,
       SUM(CASE WHEN event_type = 'task:outcome' AND status IN ('success', 'cached') THEN 1 ELSE 0 END) AS succeeded,
       SUM(CASE WHEN event_type = 'task:outcome' AND status NOT IN ('success', 'cached') THEN 1 ELSE 0 END) AS failed,
       GROUP_CONCAT(DISTINCT handler) AS handlers
     FROM dispatch_events
     WHERE event_type != 'registry:reload'
     GROUP BY trace_id
     ORDER BY MAX(id) DESC
     LIMIT ?`,
  ).all(limit) as RouteSummaryRow[];
}

export function getHandlerOutcomeCounts(
  db: BetterSqlite3.Database,
  sinceIso?: string,
): readonly HandlerOutcomeCountRow[] {
  return db.prepare(
    `SELECT handler, status, COUNT(*) AS total
     FROM dispatch_events
     WHERE event_type = 'task:outcome'
       AND handler IS NOT NULL
       AND status IS NOT NULL
       AND created_at >= ?
     GROUP BY handler, status
     ORDER BY handler ASC, status ASC`,
  ).all(sinceIso ?? "") as HandlerOutcomeCountRow[];
}

export function cleanupOldEvents(
  db: BetterSqlite3.Database,
  daysToKeep: number = 30,
): number {
  const result = db.prepare(
    `DELETE FROM dispatch_events
     WHERE created_at < strftime('%Y-%m-%dT%H:%M:%fZ', 'now', ?)`,
  ).run(`-${String(daysToKeep)} days`);

  return result.changes;
}

export interface TraceEvent {
  readonly eventType: string;
  readonly handler: string | null;
  readonly status: string | null;
  readonly message: string;
  readonly metadata: unknown;
  readonly level: EventLevel;
  readonly createdAt: string;
}

export function readTrace(db: BetterSqlite3.Database, traceId: string): readonly TraceEvent[] {
  return getEventsByTraceId(db, traceId).map((row) => ({
    eventType: row.event_type,
    handler: row.handler,
    status: row.status,
    message: row.message,
    metadata: row.metadata === null ? null : parseMetadata(row.metadata),
    level: row.level,
    createdAt: row.created_at,
  }));
}

export interface AuditReport {
  readonly routes: readonly RouteSummaryRow[];
  /** Outcome totals keyed by handler, then by outcome status. */
  readonly handlers: Readonly<Record<string, Readonly<Record<string, number>>>>;
}

export function readAuditReport(
  db: BetterSqlite3.Database,
  options: { readonly limit?: number; readonly sinceIso?: string } = {},
): AuditReport {
  const handlers: Record<string, Record<string, number>> = {};
  for (const row of getHandlerOutcomeCounts(db, options.sinceIso)) {
    const byStatus = handlers[row.handler] ?? {};
    byStatus[row.status] = row.total;
    handlers[row.handler] = byStatus;
  }

  return { routes: getRecentRoutes(db, options.limit), handlers };
}

/** Opens the audit database and drops events past the retention window. */
export function openAuditStore(dbPath: string, retentionDays: number): BetterSqlite3.Database {
  const db = openDatabase(dbPath);
  const removed = cleanupOldEvents(db, retentionDays);
  if (removed > 0) {
    logger.info({ removed, retentionDays }, "Pruned expired dispatch events");
  }
  return db;
}

function parseMetadata(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch (error) {
    logger.debug({ error: error instanceof Error ? error.message : String(error) }, "Unreadable event metadata");
    return json;
  }
}
