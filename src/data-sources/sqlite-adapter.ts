/**
 * SQLite adapter wrapping sql.js (WASM).
 *
 * sql.js runs SQLite entirely in WebAssembly with no native addon. Databases
 * live in memory and must be explicitly persisted to disk.
 */
import initSqlJs, {
  type Database as SqlJsDatabase,
  type SqlJsStatic,
  type SqlValue,
} from "sql.js";
import fs from "fs";
import path from "path";

export type { SqlValue };
export type SqlRow = Record<string, SqlValue>;

// ---------------------------------------------------------------------------
// Singleton WASM initialization
// ---------------------------------------------------------------------------

let SQL: SqlJsStatic | null = null;

/** Load the sql.js WASM binary. Idempotent. */
export async function ensureSqlJs(): Promise<SqlJsStatic> {
  if (!SQL) {
    SQL = await initSqlJs();
  }
  return SQL;
}

// ---------------------------------------------------------------------------
// PreparedStatement
// ---------------------------------------------------------------------------

export class PreparedStatement {
  private db: SqlJsDatabase;
  private sql: string;
  private parent: SqliteDatabase;

  constructor(db: SqlJsDatabase, sql: string, parent: SqliteDatabase) {
    this.db = db;
    this.sql = sql;
    this.parent = parent;
  }

  /** Execute INSERT/UPDATE/DELETE. Returns the last rowid and changed row count. */
  run(...params: SqlValue[]): { lastInsertRowid: number; changes: number } {
    const stmt = this.db.prepare(this.sql);
    try {
      if (params.length > 0) stmt.bind(params);
      stmt.step();
    } finally {
      stmt.free();
    }
    const changes = this.db.getRowsModified();
    this.parent.markDirty();
    const result = this.db.exec("SELECT last_insert_rowid() as id");
    const raw =
      result.length > 0 && result[0].values.length > 0
        ? result[0].values[0][0]
        : 0;
    return { lastInsertRowid: typeof raw === "number" ? raw : 0, changes };
  }

  /** Execute SELECT, return first row or undefined. */
  get(...params: SqlValue[]): SqlRow | undefined {
    const stmt = this.db.prepare(this.sql);
    try {
      if (params.length > 0) stmt.bind(params);
      if (stmt.step()) {
        return stmt.getAsObject();
      }
      return undefined;
    } finally {
      stmt.free();
    }
  }

  /** Execute SELECT, return all rows. */
  all(...params: SqlValue[]): SqlRow[] {
    const stmt = this.db.prepare(this.sql);
    const rows: SqlRow[] = [];
    try {
      if (params.length > 0) stmt.bind(params);
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
    } finally {
      stmt.free();
    }
    return rows;
  }
}

// ---------------------------------------------------------------------------
// SqliteDatabase
// ---------------------------------------------------------------------------

export class SqliteDatabase {
  private db: SqlJsDatabase;
  private filePath: string | null;
  private dirty = false;

  private constructor(db: SqlJsDatabase, filePath: string | null) {
    this.db = db;
    this.filePath = filePath;
  }

  /** Open a file-backed database (loads existing file or creates new).
   *  Validates the SQLite header so a corrupted file is never overwritten. */
  static open(filePath: string): SqliteDatabase {
    if (!SQL) throw new Error("Call ensureSqlJs() before opening a database");
    let db: SqlJsDatabase;
    if (fs.existsSync(filePath)) {
      const buffer = fs.readFileSync(filePath);
      if (buffer.length < 100) {
        throw new Error(
          `Database file too small to be valid SQLite: ${filePath} (${buffer.length} bytes)`,
        );
      }
      if (buffer.subarray(0, 15).toString("utf8") !== "SQLite format 3") {
        throw new Error(
          `Not a valid SQLite database (bad header): ${filePath}`,
        );
      }
      db = new SQL.Database(new Uint8Array(buffer));
    } else {
      db = new SQL.Database();
    }
    return new SqliteDatabase(db, filePath);
  }

  /** Create an in-memory database (useful for tests). */
  static inMemory(): SqliteDatabase {
    if (!SQL) throw new Error("Call ensureSqlJs() before opening a database");
    return new SqliteDatabase(new SQL.Database(), null);
  }

  /** Run one or more SQL statements (DDL, multi-statement strings). */
  sqlExec(sql: string): void {
    this.db.run(sql);
    this.dirty = true;
  }

  /** Prepare a parameterized statement. */
  prepare(sql: string): PreparedStatement {
    return new PreparedStatement(this.db, sql, this);
  }

  /** Write the in-memory database to disk (no-op for in-memory DBs).
   *  Write-then-rename: a crash mid-write leaves the previous file intact. */
  persist(): void {
    if (this.filePath && this.dirty) {
      const data = this.db.export();
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
      const tmpPath = `${this.filePath}.tmp`;
      fs.writeFileSync(tmpPath, Buffer.from(data));
      fs.renameSync(tmpPath, this.filePath);
      this.dirty = false;
    }
  }

  /** Mark the database as dirty (after writes via PreparedStatement). */
  markDirty(): void {
    this.dirty = true;
  }

  /** Close the database, persisting to disk first if file-backed. */
  close(): void {
    this.persist();
    this.db.close();
  }
}

// ---------------------------------------------------------------------------
// Row readers
// ---------------------------------------------------------------------------

export function rowString(row: SqlRow, key: string): string {
  const v = row[key];
  if (typeof v === "string") return v;
  if (typeof v === "number") return String(v);
  throw new Error(`Expected text column "${key}"`);
}

export function rowNumber(row: SqlRow, key: string): number {
  const v = row[key];
  if (typeof v === "number") return v;
  throw new Error(`Expected numeric column "${key}"`);
}
