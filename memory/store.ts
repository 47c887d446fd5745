/**
 * SQLite audit store
 *
 * Records one row per obfuscation run and keeps the consistency map across
 * runs, so the same value can be given the same replacement in every
 * statement a user processes. Only hashes and replacements are stored,
 * never original PII text.
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import type { Logger } from "../logger.js";
import type { ConsistencyEntry, ConsistencyMap } from "../obfuscation/types.js";

// =============================================================================
// Schema
// =============================================================================

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS obfuscation_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT DEFAULT (datetime('now')),
  document_title TEXT,
  entities_received INTEGER NOT NULL,
  entities_obfuscated INTEGER NOT NULL,
  integrity_verified INTEGER NOT NULL,
  degraded INTEGER NOT NULL DEFAULT 0,
  error TEXT,
  duration_ms INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS consistency_map (
  entity_hash TEXT PRIMARY KEY,
  entity_type TEXT NOT NULL,
  replacement TEXT NOT NULL,
  hits INTEGER NOT NULL DEFAULT 1,
  first_seen TEXT DEFAULT (datetime('now')),
  last_seen TEXT DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_obfuscation_runs_timestamp ON obfuscation_runs(timestamp DESC);
CREATE INDEX IF NOT EXISTS idx_obfuscation_runs_degraded ON obfuscation_runs(degraded);
`;

const IN_MEMORY_PATH = ":memory:";

// =============================================================================
// Types
// =============================================================================

export type RunLogInput = {
  documentTitle?: string;
  entitiesReceived: number;
  entitiesObfuscated: number;
  integrityVerified: boolean;
  degraded: boolean;
  error?: string;
  durationMs: number;
};

export type RunLogEntry = RunLogInput & {
  id: number;
  timestamp: string;
};

export type StoreStats = {
  totalRuns: number;
  degradedRuns: number;
  integrityFailures: number;
  totalEntitiesObfuscated: number;
  avgDurationMs: number;
};

type DbRunRow = {
  id: number;
  timestamp: string;
  document_title: string | null;
  entities_received: number;
  entities_obfuscated: number;
  integrity_verified: number;
  degraded: number;
  error: string | null;
  duration_ms: number;
};

type DbConsistencyRow = {
  entity_type: string;
  replacement: string;
};

type CountRow = { count: number };

// =============================================================================
// Store Class
// =============================================================================

export class ObfuscationStore {
  private db: Database.Database;
  private log: Logger;

  constructor(dbPath: string, log: Logger) {
    this.log = log;

    if (dbPath !== IN_MEMORY_PATH) {
      // Ensure directory exists
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== IN_MEMORY_PATH) {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.exec(SCHEMA_SQL);

    this.log.info(`Obfuscation store initialized at ${dbPath}`);
  }

  /**
   * Log an obfuscation run
   */
  logRun(entry: RunLogInput): number {
    const result = this.db
      .prepare<[string | null, number, number, number, number, string | null, number]>(
        `
        INSERT INTO obfuscation_runs
          (document_title, entities_received, entities_obfuscated, integrity_verified, degraded, error, duration_ms)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `,
      )
      .run(
        entry.documentTitle ?? null,
        entry.entitiesReceived,
        entry.entitiesObfuscated,
        entry.integrityVerified ? 1 : 0,
        entry.degraded ? 1 : 0,
        entry.error ?? null,
        entry.durationMs,
      );

    return Number(result.lastInsertRowid);
  }

  /**
   * Most recent runs first
   */
  getRecentRuns(limit: number = 20): RunLogEntry[] {
    const rows = this.db
      .prepare<[number], DbRunRow>(
        `
        SELECT * FROM obfuscation_runs
        ORDER BY timestamp DESC, id DESC
        LIMIT ?
      `,
      )
      .all(limit);

    return rows.map(toRunLogEntry);
  }

  getStats(): StoreStats {
    const count = (sql: string) => this.db.prepare<[], CountRow>(sql).get()?.count ?? 0;

    const totals = this.db
      .prepare<[], { entities: number | null; avg: number | null }>(
        "SELECT SUM(entities_obfuscated) as entities, AVG(duration_ms) as avg FROM obfuscation_runs",
      )
      .get();

    return {
      totalRuns: count("SELECT COUNT(*) as count FROM obfuscation_runs"),
      degradedRuns: count("SELECT COUNT(*) as count FROM obfuscation_runs WHERE degraded = 1"),
      integrityFailures: count(
        "SELECT COUNT(*) as count FROM obfuscation_runs WHERE degraded = 0 AND integrity_verified = 0",
      ),
      totalEntitiesObfuscated: totals?.entities ?? 0,
      avgDurationMs: Math.round(totals?.avg ?? 0),
    };
  }

  // ===========================================================================
  // Consistency Map
  // ===========================================================================

  /**
   * Upsert every entry; a hash seen before has its replacement refreshed and
   * its hit count incremented. Returns the number of entries written.
   */
  saveConsistencyMap(map: ConsistencyMap): number {
    const upsert = this.db.prepare<[string, string, string]>(`
      INSERT INTO consistency_map (entity_hash, entity_type, replacement)
      VALUES (?, ?, ?)
      ON CONFLICT(entity_hash) DO UPDATE SET
        entity_type = excluded.entity_type,
        replacement = excluded.replacement,
        hits = hits + 1,
        last_seen = datetime('now')
    `);

    const saveAll = this.db.transaction((entries: Array<[string, ConsistencyEntry]>) => {
      for (const [hash, entry] of entries) {
        upsert.run(hash, entry.entityType, entry.replacement);
      }
      return entries.length;
    });

    const saved = saveAll([...map]);
    this.log.debug?.(`Saved ${saved} consistency map entries`);
    return saved;
  }

  lookupReplacement(hash: string): ConsistencyEntry | undefined {
    const row = this.db
      .prepare<[string], DbConsistencyRow>(
        "SELECT entity_type, replacement FROM consistency_map WHERE entity_hash = ?",
      )
      .get(hash);

    return row ? { entityType: row.entity_type, replacement: row.replacement } : undefined;
  }

  getConsistencyHits(hash: string): number {
    const row = this.db
      .prepare<[string], { hits: number }>("SELECT hits FROM consistency_map WHERE entity_hash = ?")
      .get(hash);
    return row?.hits ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

function toRunLogEntry(row: DbRunRow): RunLogEntry {
  const entry: RunLogEntry = {
    id: row.id,
    timestamp: row.timestamp,
    entitiesReceived: row.entities_received,
    entitiesObfuscated: row.entities_obfuscated,
    integrityVerified: row.integrity_verified === 1,
    degraded: row.degraded === 1,
    durationMs: row.duration_ms,
  };
  if (row.document_title !== null) entry.documentTitle = row.document_title;
  if (row.error !== null) entry.error = row.error;
  return entry;
}

// =============================================================================
// Factory
// =============================================================================

export function createObfuscationStore(dbPath: string, log: Logger): ObfuscationStore {
  return new ObfuscationStore(dbPath, log);
}
