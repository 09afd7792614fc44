/**
 * Registry error taxonomy. Every failure a caller can recover from is a
 * {@link RegistryError} with a `kind`; the CLI maps kinds to exit codes and
 * the API maps them to HTTP status codes.
 *
 * @module
 */

import { ZodError } from 'zod';

/** All recoverable failure kinds. */
export const registryErrorKinds = [
  'InvalidInput',
  'MalformedPath',
  'DuplicateResultPath',
  'DuplicateID',
  'NotFound',
  'ImmutableFieldViolation',
  'StageMismatch',
  'AlreadyLinked',
  'ReferencedByDependents',
  'CycleDetected',
] as const;

export type RegistryErrorKind = (typeof registryErrorKinds)[number];

/** Process exit code per error kind. 1 is reserved for unexpected errors. */
export const EXIT_CODES: Record<RegistryErrorKind, number> = {
  InvalidInput: 2,
  MalformedPath: 3,
  DuplicateResultPath: 4,
  DuplicateID: 5,
  NotFound: 6,
  ImmutableFieldViolation: 7,
  StageMismatch: 8,
  AlreadyLinked: 9,
  ReferencedByDependents: 10,
  CycleDetected: 11,
};

/** HTTP status per error kind, used by the inspection API. */
export const HTTP_STATUS: Record<RegistryErrorKind, number> = {
  InvalidInput: 400,
  MalformedPath: 400,
  DuplicateResultPath: 409,
  DuplicateID: 409,
  NotFound: 404,
  ImmutableFieldViolation: 400,
  StageMismatch: 400,
  AlreadyLinked: 409,
  ReferencedByDependents: 409,
  CycleDetected: 500,
};

export class RegistryError extends Error {
  constructor(
    public readonly kind: RegistryErrorKind,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

/** Type guard, optionally narrowing to one kind. */
export function isRegistryError(
  err: unknown,
  kind?: RegistryErrorKind,
): err is RegistryError {
  return (
    err instanceof RegistryError && (kind === undefined || err.kind === kind)
  );
}

/** Flatten zod issues into one line: `field: message; field: message`. */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

/** Wrap a zod validation failure as an InvalidInput registry error. */
export function invalidInput(context: string, error: ZodError): RegistryError {
  return new RegistryError(
    'InvalidInput',
    `Invalid ${context}: ${formatZodIssues(error)}`,
  );
}

/** User-facing rendering of a failure. */
export interface ErrorDescription {
  kind: RegistryErrorKind | 'Unexpected';
  exitCode: number;
  message: string;
}

/** Translate any thrown value into a message and exit code. */
export function describeError(err: unknown): ErrorDescription {
  if (err instanceof RegistryError) {
    return {
      kind: err.kind,
      exitCode: EXIT_CODES[err.kind],
      message: `${err.kind}: ${err.message}`,
    };
  }
  if (err instanceof ZodError) {
    return {
      kind: 'InvalidInput',
      exitCode: EXIT_CODES.InvalidInput,
      message: `InvalidInput: ${formatZodIssues(err)}`,
    };
  }
  return {
    kind: 'Unexpected',
    exitCode: 1,
    message: `Unexpected error: ${err instanceof Error ? err.message : String(err)}`,
  };
}
