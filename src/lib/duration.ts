/**
 * Elapsed-time parsing and formatting for training durations.
 *
 * @module
 */

import { RegistryError } from '../errors.js';

const UNIT_SECONDS = {
  d: 86400,
  h: 3600,
  m: 60,
  s: 1,
} as const;

type Unit = keyof typeof UNIT_SECONDS;

const UNITS: Unit[] = ['d', 'h', 'm', 's'];

/**
 * Parse a duration into seconds. Accepts a bare number of seconds (`3600`,
 * `90.5`) or unit groups in descending order (`12h`, `1d6h`, `2h 30m`,
 * `45s`).
 */
export function parseDuration(input: string): number {
  const text = input.trim().toLowerCase();
  if (text === '') {
    throw new RegistryError('InvalidInput', 'Duration is empty');
  }

  if (/^\d+(\.\d+)?$/.test(text)) return Number(text);

  const groups = /^(?:(\d+)d)?\s*(?:(\d+)h)?\s*(?:(\d+)m)?\s*(?:(\d+)s)?$/.exec(
    text,
  );
  if (!groups || groups.slice(1).every((g) => g === undefined)) {
    throw new RegistryError(
      'InvalidInput',
      `Invalid duration format: ${input} (expected e.g. 3600, 90m, 12h, 1d6h)`,
    );
  }

  let total = 0;
  UNITS.forEach((unit, index) => {
    const amount = groups[index + 1];
    if (amount !== undefined) total += parseInt(amount, 10) * UNIT_SECONDS[unit];
  });
  return total;
}

/** Render seconds compactly, e.g. `93784` → `1d2h3m4s`, `0` → `0s`. */
export function formatDuration(totalSeconds: number): string {
  let remaining = Math.round(totalSeconds);
  if (remaining === 0) return '0s';

  let out = '';
  for (const unit of UNITS) {
    const size = UNIT_SECONDS[unit];
    const amount = Math.floor(remaining / size);
    if (amount > 0) {
      out += `${String(amount)}${unit}`;
      remaining -= amount * size;
    }
  }
  return out;
}
