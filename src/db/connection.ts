/**
 * SQLite connection manager. Creates DB file with parent directories, enables WAL mode for concurrency.
 *
 * @module
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import Database from 'better-sqlite3';

export type Db = Database.Database;

/** Connection options. */
export interface ConnectionOptions {
  /** How long to wait for another writer's lock before failing, in milliseconds. */
  busyTimeoutMs?: number;
}

/**
 * Create and configure a SQLite database connection.
 * Ensures parent directories exist and enables WAL mode for better concurrency.
 */
export function createConnection(
  dbPath: string,
  options: ConnectionOptions = {},
): Db {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath, { timeout: options.busyTimeoutMs ?? 5000 });

  // Enable WAL mode for better concurrency
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  return db;
}

/**
 * Close a database connection cleanly.
 */
export function closeConnection(db: Db): void {
  db.close();
}
