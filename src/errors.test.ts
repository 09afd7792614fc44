import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import {
  describeError,
  EXIT_CODES,
  isRegistryError,
  RegistryError,
  registryErrorKinds,
} from './errors.js';

describe('describeError', () => {
  it('should prefix registry errors with their kind', () => {
    expect(
      describeError(new RegistryError('NotFound', 'Run 7 not found')),
    ).toEqual({ kind: 'NotFound', exitCode: 6, message: 'NotFound: Run 7 not found' });
  });

  it('should treat validation failures as invalid input', () => {
    const result = z.object({ port: z.number() }).safeParse({ port: 'x' });
    if (result.success) throw new Error('expected a validation failure');

    expect(describeError(result.error)).toEqual({
      kind: 'InvalidInput',
      exitCode: 2,
      message: 'InvalidInput: port: Expected number, received string',
    });
  });

  it('should report anything else as unexpected', () => {
    expect(describeError(new Error('disk full'))).toEqual({
      kind: 'Unexpected',
      exitCode: 1,
      message: 'Unexpected error: disk full',
    });
    expect(describeError('boom').message).toBe('Unexpected error: boom');
  });
});

describe('EXIT_CODES', () => {
  it('should give every kind its own code above the generic failure code', () => {
    const codes = registryErrorKinds.map((kind) => EXIT_CODES[kind]);

    expect(new Set(codes).size).toBe(registryErrorKinds.length);
    expect(codes.every((code) => code > 1)).toBe(true);
  });
});

describe('isRegistryError', () => {
  it('should narrow by kind', () => {
    const err = new RegistryError('CycleDetected', 'loop');

    expect(isRegistryError(err)).toBe(true);
    expect(isRegistryError(err, 'CycleDetected')).toBe(true);
    expect(isRegistryError(err, 'NotFound')).toBe(false);
    expect(isRegistryError(new Error('loop'))).toBe(false);
  });
});
