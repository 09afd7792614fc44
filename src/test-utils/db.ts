/**
 * Shared test utilities for database setup and teardown.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { pino } from 'pino';

import { closeConnection, createConnection, type Db } from '../db/connection.js';
import { runMigrations } from '../db/migrations.js';
import {
  createPathResolver,
  type PathResolverOptions,
} from '../paths/path-resolver.js';
import { createRegistry, type Registry } from '../registry/registry.js';
import { createRunStore, type RunStore } from '../registry/store.js';

/** Test database context. */
export interface TestDb {
  /** Database connection. */
  db: Db;
  /** Temporary directory holding the database. */
  dir: string;
  /** Database file path. */
  dbPath: string;
  /** Cleanup function to close DB and remove temp directory. */
  cleanup: () => void;
}

/** Create a temporary test database with migrations applied. */
export function createTestDb(): TestDb {
  const testDir = mkdtempSync(join(tmpdir(), 'run-ledger-test-'));
  const dbPath = join(testDir, 'test.db');
  const db = createConnection(dbPath);
  runMigrations(db);

  return {
    db,
    dir: testDir,
    dbPath,
    cleanup: () => {
      if (db.open) closeConnection(db);
      // Windows can have file locks from WAL mode, retry a few times
      try {
        rmSync(testDir, {
          recursive: true,
          force: true,
          maxRetries: 3,
          retryDelay: 100,
        });
      } catch {
        // Ignore cleanup errors in tests
      }
    },
  };
}

/** Silent logger for tests. */
export const silentLogger = pino({ level: 'silent' });

/** Store and registry over a test database. */
export function createTestRegistry(
  testDb: TestDb,
  paths: PathResolverOptions = {},
): { store: RunStore; registry: Registry } {
  const store = createRunStore({
    db: testDb.db,
    resolver: createPathResolver(paths),
  });
  return {
    store,
    registry: createRegistry({ db: testDb.db, store, logger: silentLogger }),
  };
}
