/**
 * Database maintenance checks: SQLite page integrity and foreign-key consistency.
 */

import type { Logger } from 'pino';

import type { Db } from './connection.js';

/** A single problem reported by SQLite's own checks. */
export interface IntegrityIssue {
  /** Which pragma reported it. */
  check: 'integrity_check' | 'foreign_key_check';
  /** Human-readable description. */
  detail: string;
}

/** Run `PRAGMA integrity_check`; an `ok` row means no problems. */
function checkPages(db: Db): IntegrityIssue[] {
  const rows = db
    .prepare<[], { integrity_check: string }>('PRAGMA integrity_check')
    .all();
  return rows
    .filter((row) => row.integrity_check !== 'ok')
    .map((row): IntegrityIssue => ({
      check: 'integrity_check',
      detail: row.integrity_check,
    }));
}

/** Run `PRAGMA foreign_key_check`; each row is a dangling reference. */
function checkForeignKeys(db: Db): IntegrityIssue[] {
  const rows = db
    .prepare<
      [],
      { table: string; rowid: number; parent: string }
    >('PRAGMA foreign_key_check')
    .all();
  return rows.map((row): IntegrityIssue => ({
    check: 'foreign_key_check',
    detail: `${row.table} row ${String(row.rowid)} references a missing ${row.parent} row`,
  }));
}

/**
 * Run all integrity checks and log any findings. Returns the issues found.
 */
export function checkIntegrity(db: Db, logger: Logger): IntegrityIssue[] {
  const issues = [...checkPages(db), ...checkForeignKeys(db)];
  if (issues.length > 0) {
    logger.warn({ issues }, 'Database integrity issues found');
  } else {
    logger.debug('Database integrity checks passed');
  }
  return issues;
}
