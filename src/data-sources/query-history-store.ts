import { logInfo } from "../core/logging.js";
import {
  rowNumber,
  rowString,
  SqliteDatabase,
  type SqlRow,
  type SqlValue,
} from "./sqlite-adapter.js";

export interface QueryHistoryRecord {
  id: number;
  tool: string;
  session_id: string;
  filter_signature: string;
  query_json: string;
  result_count: number;
  executed_at: string;
}

export interface ListQueryOptions {
  tool?: string;
  sessionId?: string;
  since?: string;
  limit?: number;
}

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2})?)?$/;

/**
 * QueryHistoryStore logs executed dashboard queries for replay and audit.
 * Shares the dashboard database with FilterPresetStore.
 */
export class QueryHistoryStore {
  private db: SqliteDatabase | null = null;

  /**
   * Initialize with an existing open SqliteDatabase instance.
   */
  initialize(db: SqliteDatabase): void {
    this.db = db;

    this.db.sqlExec(`
      CREATE TABLE IF NOT EXISTS query_history (
        id               INTEGER PRIMARY KEY AUTOINCREMENT,
        tool             TEXT NOT NULL,
        session_id       TEXT NOT NULL,
        filter_signature TEXT NOT NULL,
        query_json       TEXT NOT NULL,
        result_count     INTEGER NOT NULL,
        executed_at      TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%S', 'now'))
      );

      CREATE INDEX IF NOT EXISTS idx_query_tool ON query_history(tool);
      CREATE INDEX IF NOT EXISTS idx_query_executed_at ON query_history(executed_at);
    `);

    this.db.persist();
    logInfo("QueryHistoryStore initialized");
  }

  logQuery(
    tool: string,
    sessionId: string,
    filterSignature: string,
    queryArgs: Record<string, unknown>,
    resultCount: number,
  ): void {
    const db = this.requireDb();

    db.prepare(
      "INSERT INTO query_history (tool, session_id, filter_signature, query_json, result_count) VALUES (?, ?, ?, ?, ?)",
    ).run(tool, sessionId, filterSignature, JSON.stringify(queryArgs), resultCount);

    db.persist();
  }

  listQueries(options?: ListQueryOptions): QueryHistoryRecord[] {
    const db = this.requireDb();

    const conditions: string[] = [];
    const params: SqlValue[] = [];

    if (options?.tool) {
      conditions.push("tool = ?");
      params.push(options.tool);
    }

    if (options?.sessionId) {
      conditions.push("session_id = ?");
      params.push(options.sessionId);
    }

    if (options?.since) {
      if (!ISO_DATE.test(options.since)) {
        throw new Error(
          `Invalid since date format: "${options.since}". Expected ISO 8601 (e.g., "2026-01-01").`,
        );
      }
      conditions.push("executed_at >= ?");
      params.push(options.since);
    }

    const where =
      conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const limit = Math.max(
      1,
      Math.min(Math.floor(options?.limit ?? DEFAULT_LIMIT), MAX_LIMIT),
    );

    return db
      .prepare(
        `SELECT * FROM query_history ${where} ORDER BY executed_at DESC, id DESC LIMIT ?`,
      )
      .all(...params, limit)
      .map(mapRow);
  }

  close(): void {
    // The context owns the shared db.
    this.db = null;
  }

  private requireDb(): SqliteDatabase {
    if (!this.db) {
      throw new Error(
        "QueryHistoryStore not initialized. Call initialize() first.",
      );
    }
    return this.db;
  }
}

function mapRow(row: SqlRow): QueryHistoryRecord {
  return {
    id: rowNumber(row, "id"),
    tool: rowString(row, "tool"),
    session_id: rowString(row, "session_id"),
    filter_signature: rowString(row, "filter_signature"),
    query_json: rowString(row, "query_json"),
    result_count: rowNumber(row, "result_count"),
    executed_at: rowString(row, "executed_at"),
  };
}
