/**
 * Path reference normalization and result-path collision checks. Works on
 * strings only; whether a directory exists on storage is not checked here.
 *
 * @module
 */

import { posix } from 'node:path';

import { RegistryError } from '../errors.js';

/** Control characters plus characters no dataset or result directory may contain. */
const DISALLOWED = /[\u0000-\u001f\u007f<>"|?*]/;

const ENV_REFERENCE = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

/** Path resolver options. */
export interface PathResolverOptions {
  /** `lower` folds stored paths to lower case. */
  case?: 'preserve' | 'lower';
  /** Directory relative paths are resolved against. */
  baseDir?: string;
  /** Variables available to `$VAR` expansion. Expansion is off when omitted. */
  env?: Readonly<Record<string, string | undefined>>;
}

/** Minimal view of a record needed for the uniqueness check. */
export interface ResultPathEntry {
  id: number;
  resultPath: string;
}

export interface PathResolver {
  /** Canonicalize a path reference, or throw `MalformedPath`. */
  normalize(path: string): string;
  /**
   * Throw `DuplicateResultPath` if any entry other than `exceptId` already
   * holds the candidate's normalized result path. Returns the normalized path.
   */
  checkUnique(
    candidateResultPath: string,
    snapshot: Iterable<ResultPathEntry>,
    exceptId?: number,
  ): string;
}

/** Replace `$VAR` / `${VAR}` with values from `env`; unknown names stay as written. */
export function expandEnv(
  path: string,
  env: Readonly<Record<string, string | undefined>>,
): string {
  return path.replace(
    ENV_REFERENCE,
    (match, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare;
      const value = name === undefined ? undefined : env[name];
      return value ?? match;
    },
  );
}

/** Strip a trailing separator, keeping a lone root `/` and drive roots like `C:/`. */
function trimTrailingSeparator(path: string): string {
  if (path.length > 1 && path.endsWith('/') && !/^[A-Za-z]:\/$/.test(path)) {
    return path.slice(0, -1);
  }
  return path;
}

function isAbsolute(path: string): boolean {
  return path.startsWith('/') || /^[A-Za-z]:\//.test(path);
}

/** POSIX normalization that keeps a `C:` prefix as the root `..` cannot climb past. */
function normalizeSegments(path: string): string {
  const drive = /^[A-Za-z]:(?=\/)/.exec(path)?.[0];
  if (drive === undefined) return posix.normalize(path);
  return drive + posix.normalize(path.slice(drive.length));
}

/** Create a path resolver with the given conventions. */
export function createPathResolver(
  options: PathResolverOptions = {},
): PathResolver {
  const caseMode = options.case ?? 'preserve';

  const fold = (path: string): string =>
    caseMode === 'lower' ? path.toLowerCase() : path;

  function normalize(path: string): string {
    const expanded = (
      options.env ? expandEnv(path, options.env) : path
    ).trim();
    if (expanded === '') {
      throw new RegistryError('MalformedPath', 'Path is empty');
    }
    if (DISALLOWED.test(expanded)) {
      throw new RegistryError(
        'MalformedPath',
        `Path contains a disallowed character: ${JSON.stringify(path)}`,
        { path },
      );
    }
    let out = expanded.replace(/\\/g, '/');
    if (!isAbsolute(out) && options.baseDir !== undefined) {
      out = `${options.baseDir.replace(/\\/g, '/')}/${out}`;
    }
    return fold(trimTrailingSeparator(normalizeSegments(out)));
  }

  return {
    normalize,

    checkUnique(
      candidateResultPath: string,
      snapshot: Iterable<ResultPathEntry>,
      exceptId?: number,
    ): string {
      const candidate = normalize(candidateResultPath);
      for (const entry of snapshot) {
        if (entry.id === exceptId) continue;
        // Snapshot entries hold stored, already-normalized paths.
        if (fold(entry.resultPath) === candidate) {
          throw new RegistryError(
            'DuplicateResultPath',
            `Result path ${candidate} is already claimed by run ${String(entry.id)}`,
            { resultPath: candidate, existingId: entry.id },
          );
        }
      }
      return candidate;
    },
  };
}
