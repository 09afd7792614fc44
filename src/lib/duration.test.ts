import { describe, expect, it } from 'vitest';

import { catchError } from '../test-utils/errors.js';
import { formatDuration, parseDuration } from './duration.js';

describe('parseDuration', () => {
  it('should accept bare seconds', () => {
    expect(parseDuration('3600')).toBe(3600);
    expect(parseDuration('90.5')).toBe(90.5);
  });

  it('should sum unit groups', () => {
    expect(parseDuration('12h')).toBe(43200);
    expect(parseDuration('1d6h')).toBe(108000);
    expect(parseDuration('2h 30m')).toBe(9000);
    expect(parseDuration('45s')).toBe(45);
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(parseDuration(' 1D ')).toBe(86400);
  });

  it('should reject empty input', () => {
    expect(catchError(() => parseDuration('  '))).toMatchObject({
      kind: 'InvalidInput',
      message: 'Duration is empty',
    });
  });

  it('should reject unknown formats and out-of-order units', () => {
    for (const input of ['abc', '6h1d', '12 hours', '-5']) {
      expect(catchError(() => parseDuration(input))).toMatchObject({
        kind: 'InvalidInput',
      });
    }
  });
});

describe('formatDuration', () => {
  it('should render compact unit groups', () => {
    expect(formatDuration(93784)).toBe('1d2h3m4s');
    expect(formatDuration(43200)).toBe('12h');
  });

  it('should render zero as 0s', () => {
    expect(formatDuration(0)).toBe('0s');
  });

  it('should round fractional seconds', () => {
    expect(formatDuration(90.4)).toBe('1m30s');
  });
});
