/**
 * Run record schema and types.
 *
 * @module
 */

import { z } from 'zod';

export const stageSchema = z.enum(['doublet', 'triplet']);

/** Positive integer run identifier. */
export const runIdSchema = z.number().int().positive();

/** Run ID as typed on a command line or in a URL. */
export const runIdArgSchema = z.coerce
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .positive('must be positive');

/** Non-negative integer (graph count, epoch) as typed on a command line or in a URL. Blank input is rejected. */
export const countArgSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .pipe(z.coerce.number().int().nonnegative());

export const sizeClassSchema = z.string().trim().min(1);

export const graphCountSchema = z.number().int().nonnegative();

export const durationSecondsSchema = z.number().finite().nonnegative();

/** A stored run record. `null` marks a field not yet known. */
export const runRecordSchema = z.object({
  /** Stable identifier, never reused. */
  id: runIdSchema,
  /** Pipeline stage, fixed at creation. */
  stage: stageSchema,
  /** Advisory problem-size label (small, medium, large, ...). */
  sizeClass: sizeClassSchema.nullable(),
  /** Number of training graphs. */
  graphCount: graphCountSchema.nullable(),
  /** Elapsed training time in seconds. */
  trainingDurationSeconds: durationSecondsSchema.nullable(),
  /** Normalized input dataset directory. */
  datasetPath: z.string(),
  /** Normalized result/checkpoint directory, unique registry-wide. */
  resultPath: z.string(),
  /** Doublet run whose checkpoint this triplet run consumes. */
  upstreamId: runIdSchema.nullable(),
  /** Free-text notes. */
  notes: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

/** Fields accepted by `put`. Paths are normalized by the store. */
export const runInputSchema = z.object({
  id: runIdSchema,
  stage: stageSchema,
  datasetPath: z.string(),
  resultPath: z.string(),
  sizeClass: sizeClassSchema.nullable().optional(),
  graphCount: graphCountSchema.nullable().optional(),
  trainingDurationSeconds: durationSecondsSchema.nullable().optional(),
  upstreamId: runIdSchema.nullable().optional(),
  notes: z.string().nullable().optional(),
});

/**
 * Fields accepted by `update`. Immutable fields are accepted so the store
 * can reject attempts to change them; unknown keys are rejected.
 */
export const runPatchSchema = runInputSchema.partial().strict();

/** Filter predicates for `list`. */
export const runFilterSchema = z.object({
  stage: stageSchema.optional(),
  sizeClass: sizeClassSchema.optional(),
  /** true: only runs with an upstream; false: only runs without one. */
  linked: z.boolean().optional(),
});

export type Stage = z.infer<typeof stageSchema>;
export type RunRecord = z.infer<typeof runRecordSchema>;
export type RunInput = z.infer<typeof runInputSchema>;
export type RunPatch = z.infer<typeof runPatchSchema>;
export type RunFilter = z.infer<typeof runFilterSchema>;

/** Fields `update` may change after creation. */
export const MUTABLE_FIELDS = [
  'sizeClass',
  'graphCount',
  'trainingDurationSeconds',
  'upstreamId',
  'notes',
] as const satisfies ReadonlyArray<keyof RunPatch>;

/** Fields fixed at creation. */
export const IMMUTABLE_FIELDS = [
  'id',
  'stage',
  'datasetPath',
  'resultPath',
] as const satisfies ReadonlyArray<keyof RunPatch>;

/** Input to `register`: a run record without its id, which the store assigns. */
export const registerRunSchema = runInputSchema.omit({ id: true });

/** Input to `complete`: at least one of the fields known only after training. */
export const completeRunSchema = z
  .object({
    trainingDurationSeconds: durationSecondsSchema.optional(),
    graphCount: graphCountSchema.optional(),
  })
  .strict()
  .refine(
    (input) =>
      input.trainingDurationSeconds !== undefined ||
      input.graphCount !== undefined,
    { message: 'provide a duration, a graph count, or both' },
  );

export type RegisterRunInput = z.infer<typeof registerRunSchema>;
export type CompleteRunInput = z.infer<typeof completeRunSchema>;
