/**
 * Ledger import file schema: a JSON array of run entries, in dependency
 * order, that bulk-loads a hand-kept run table.
 *
 * @module
 */

import { z } from 'zod';

import {
  durationSecondsSchema,
  graphCountSchema,
  sizeClassSchema,
  stageSchema,
} from './run.js';

/** One ledger row. */
export const ledgerEntrySchema = z
  .object({
    stage: stageSchema,
    datasetPath: z.string(),
    resultPath: z.string(),
    sizeClass: sizeClassSchema.optional(),
    graphCount: graphCountSchema.optional(),
    /** Seconds, or a duration string such as `12h` or `1d6h`. */
    duration: z.union([durationSecondsSchema, z.string()]).optional(),
    notes: z.string().optional(),
    /** Result path of the doublet run this triplet run consumes. */
    upstreamResultPath: z.string().optional(),
  })
  .strict();

export const ledgerSchema = z.array(ledgerEntrySchema);

export type LedgerEntry = z.infer<typeof ledgerEntrySchema>;
