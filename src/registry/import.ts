/**
 * Bulk import of a JSON run ledger. Entries are applied in file order in a
 * single write transaction: either every entry is registered or none is.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { Logger } from 'pino';

import { invalidInput, isRegistryError, RegistryError } from '../errors.js';
import { parseDuration } from '../lib/duration.js';
import { type LedgerEntry, ledgerSchema } from '../schemas/ledger.js';
import type { RunRecord } from '../schemas/run.js';
import type { RunStore } from './store.js';

/** Resolve an entry's upstream result path to the id of the run holding it. */
function resolveUpstream(store: RunStore, entry: LedgerEntry): number | null {
  if (entry.upstreamResultPath === undefined) return null;
  const upstream = store.findByResultPath(entry.upstreamResultPath);
  if (!upstream) {
    throw new RegistryError(
      'NotFound',
      `No run holds upstream result path ${entry.upstreamResultPath}`,
      { resultPath: entry.upstreamResultPath },
    );
  }
  return upstream.id;
}

function durationOf(entry: LedgerEntry): number | null {
  if (entry.duration === undefined) return null;
  return typeof entry.duration === 'number'
    ? entry.duration
    : parseDuration(entry.duration);
}

/**
 * Read and parse a ledger file. An unreadable file or malformed JSON is
 * `InvalidInput`; the entries themselves are validated by `importLedger`.
 */
export function readLedgerFile(file: string): unknown {
  let text: string;
  try {
    text = readFileSync(resolve(file), 'utf-8');
  } catch (err) {
    throw new RegistryError(
      'InvalidInput',
      `Cannot read ledger file ${file}: ${err instanceof Error ? err.message : String(err)}`,
      { file },
    );
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new RegistryError(
        'InvalidInput',
        `Invalid JSON in ledger file ${file}: ${err.message}`,
        { file },
      );
    }
    throw err;
  }
}

/**
 * Register every ledger entry. `entries` is the parsed JSON document;
 * it is validated here. Returns the created records in file order.
 */
export function importLedger(
  store: RunStore,
  entries: unknown,
  logger: Logger,
): RunRecord[] {
  const parsed = ledgerSchema.safeParse(entries);
  if (!parsed.success) throw invalidInput('ledger', parsed.error);

  const created = store.write(() =>
    parsed.data.map((entry, index) => {
      try {
        return store.put({
          id: store.nextId(),
          stage: entry.stage,
          datasetPath: entry.datasetPath,
          resultPath: entry.resultPath,
          sizeClass: entry.sizeClass ?? null,
          graphCount: entry.graphCount ?? null,
          trainingDurationSeconds: durationOf(entry),
          upstreamId: resolveUpstream(store, entry),
          notes: entry.notes ?? null,
        });
      } catch (err) {
        if (isRegistryError(err)) {
          throw new RegistryError(
            err.kind,
            `Ledger entry ${String(index + 1)}: ${err.message}`,
            { ...err.details, entry: index + 1 },
          );
        }
        throw err;
      }
    }),
  );

  logger.info({ count: created.length }, 'Ledger imported');
  return created;
}
