/**
 * Schema migration runner. Tracks applied migrations via schema_version table, applies pending migrations idempotently.
 */

import type { Db } from './connection.js';

/** Initial schema: one row per training run, keyed by a never-reused id. */
const MIGRATION_001 = `
CREATE TABLE IF NOT EXISTS runs (
    id                  INTEGER PRIMARY KEY AUTOINCREMENT,
    stage               TEXT NOT NULL CHECK (stage IN ('doublet', 'triplet')),
    size_class          TEXT,
    graph_count         INTEGER CHECK (graph_count IS NULL OR graph_count >= 0),
    training_duration_s REAL CHECK (training_duration_s IS NULL OR training_duration_s >= 0),
    dataset_path        TEXT NOT NULL,
    result_path         TEXT NOT NULL UNIQUE,
    upstream_id         INTEGER REFERENCES runs(id),
    notes               TEXT,
    created_at          TEXT DEFAULT (datetime('now')),
    updated_at          TEXT DEFAULT (datetime('now')),
    CHECK (stage = 'triplet' OR upstream_id IS NULL)
);

CREATE INDEX IF NOT EXISTS idx_runs_stage ON runs(stage);
CREATE INDEX IF NOT EXISTS idx_runs_upstream ON runs(upstream_id) WHERE upstream_id IS NOT NULL;
`;

/** Migration 002: enforce creation-time fields and doublet-only upstreams in the database itself. */
const MIGRATION_002 = `
CREATE TRIGGER IF NOT EXISTS runs_immutable_fields
BEFORE UPDATE OF id, stage, dataset_path, result_path ON runs
WHEN NEW.id IS NOT OLD.id
  OR NEW.stage IS NOT OLD.stage
  OR NEW.dataset_path IS NOT OLD.dataset_path
  OR NEW.result_path IS NOT OLD.result_path
BEGIN
    SELECT RAISE(ABORT, 'immutable run field');
END;

CREATE TRIGGER IF NOT EXISTS runs_upstream_stage_insert
BEFORE INSERT ON runs
WHEN NEW.upstream_id IS NOT NULL
  AND (SELECT stage FROM runs WHERE id = NEW.upstream_id) IS NOT 'doublet'
BEGIN
    SELECT RAISE(ABORT, 'upstream run must be a doublet run');
END;

CREATE TRIGGER IF NOT EXISTS runs_upstream_stage_update
BEFORE UPDATE OF upstream_id ON runs
WHEN NEW.upstream_id IS NOT NULL
  AND (SELECT stage FROM runs WHERE id = NEW.upstream_id) IS NOT 'doublet'
BEGIN
    SELECT RAISE(ABORT, 'upstream run must be a doublet run');
END;
`;

/** Registry of all migrations keyed by version number. */
const MIGRATIONS: Record<number, string> = {
  1: MIGRATION_001,
  2: MIGRATION_002,
};

/** Highest migration version this build knows about. */
export const LATEST_SCHEMA_VERSION = Math.max(
  ...Object.keys(MIGRATIONS).map(Number),
);

/** Current schema version of a database (0 when nothing has been applied). */
export function getSchemaVersion(db: Db): number {
  const table = db
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'`,
    )
    .get();
  if (!table) return 0;

  const row = db
    .prepare<
      [],
      { version: number | null }
    >('SELECT MAX(version) as version FROM schema_version')
    .get();
  return row?.version ?? 0;
}

/**
 * Run all pending migrations. Creates schema_version table if needed, applies migrations in order.
 */
export function runMigrations(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT DEFAULT (datetime('now'))
    );
  `);

  const currentVersion = getSchemaVersion(db);

  const pendingVersions = Object.keys(MIGRATIONS)
    .map(Number)
    .filter((v) => v > currentVersion)
    .sort((a, b) => a - b);

  const record = db.prepare<[number]>(
    'INSERT INTO schema_version (version) VALUES (?)',
  );

  for (const version of pendingVersions) {
    const sql = MIGRATIONS[version];
    if (sql === undefined) continue;
    db.transaction(() => {
      db.exec(sql);
      record.run(version);
    })();
  }
}
