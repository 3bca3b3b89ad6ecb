import path from "path";
import { logInfo } from "../core/logging.js";
import type { FilterSet } from "../domain/filters/types.js";
import { parseFilterSet, filterSignature } from "../domain/filters/filter-engine.js";
import {
  rowString,
  SqliteDatabase,
  type SqlRow,
} from "./sqlite-adapter.js";

export const DB_FILENAME = "dashboard.db";

export interface FilterPreset {
  name: string;
  filters: FilterSet;
  signature: string;
  created_at: string;
  updated_at: string;
}

const MAX_NAME_LENGTH = 80;
const NAME_PATTERN = /^[\w .:-]+$/;

/**
 * Named filter sets that survive restarts. Owns the dashboard database;
 * QueryHistoryStore shares the same handle via getDatabase().
 */
export class FilterPresetStore {
  private db: SqliteDatabase | null = null;
  private dataDir: string | null;

  /** Pass null for an in-memory store. */
  constructor(dataDir: string | null) {
    this.dataDir = dataDir;
  }

  initialize(): void {
    this.db = this.dataDir
      ? SqliteDatabase.open(path.join(this.dataDir, DB_FILENAME))
      : SqliteDatabase.inMemory();

    this.db.sqlExec(`
      CREATE TABLE IF NOT EXISTS filter_presets (
        name         TEXT PRIMARY KEY,
        filters_json TEXT NOT NULL,
        signature    TEXT NOT NULL,
        created_at   TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%S', 'now')),
        updated_at   TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%S', 'now'))
      );
    `);

    this.db.persist();
    logInfo("FilterPresetStore initialized");
  }

  getDatabase(): SqliteDatabase {
    return this.requireDb();
  }

  /** Insert or replace a preset by name. */
  save(name: string, filters: FilterSet): FilterPreset {
    const db = this.requireDb();
    const trimmed = validateName(name);

    db.prepare(
      `INSERT INTO filter_presets (name, filters_json, signature)
       VALUES (?, ?, ?)
       ON CONFLICT(name) DO UPDATE SET
         filters_json = excluded.filters_json,
         signature = excluded.signature,
         updated_at = strftime('%Y-%m-%dT%H:%M:%S', 'now')`,
    ).run(trimmed, JSON.stringify(filters), filterSignature(filters));
    db.persist();

    const saved = this.get(trimmed);
    if (!saved) throw new Error(`Preset "${trimmed}" was not saved`);
    return saved;
  }

  get(name: string): FilterPreset | null {
    const row = this.requireDb()
      .prepare("SELECT * FROM filter_presets WHERE name = ?")
      .get(name.trim());
    return row ? mapRow(row) : null;
  }

  list(): FilterPreset[] {
    return this.requireDb()
      .prepare("SELECT * FROM filter_presets ORDER BY name ASC")
      .all()
      .map(mapRow);
  }

  delete(name: string): boolean {
    const db = this.requireDb();
    const { changes } = db
      .prepare("DELETE FROM filter_presets WHERE name = ?")
      .run(name.trim());
    db.persist();
    return changes > 0;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private requireDb(): SqliteDatabase {
    if (!this.db) {
      throw new Error(
        "FilterPresetStore not initialized. Call initialize() first.",
      );
    }
    return this.db;
  }
}

function validateName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) throw new Error("Preset name must not be empty");
  if (trimmed.length > MAX_NAME_LENGTH) {
    throw new Error(`Preset name exceeds ${MAX_NAME_LENGTH} characters`);
  }
  if (!NAME_PATTERN.test(trimmed)) {
    throw new Error(
      `Invalid preset name "${trimmed}": use letters, digits, spaces, "_", "-", "." or ":"`,
    );
  }
  return trimmed;
}

function mapRow(row: SqlRow): FilterPreset {
  const raw: unknown = JSON.parse(rowString(row, "filters_json"));
  const filters = parseFilterSet(raw);
  return {
    name: rowString(row, "name"),
    filters,
    signature: rowString(row, "signature"),
    created_at: rowString(row, "created_at"),
    updated_at: rowString(row, "updated_at"),
  };
}
