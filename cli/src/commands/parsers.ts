/**
 * Commander option parsers. Each throws InvalidArgumentError so commander
 * reports the offending flag and exits non-zero before any work starts.
 */

import { InvalidArgumentError } from 'commander';

/** Any integer, including 0 and negatives (e.g. --every 0 disables splitting). */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parseInt(value, 10);
}

export function parseNonNegativeInt(value: string): number {
  const n = parseInteger(value);
  if (n < 0) {
    throw new InvalidArgumentError(`Expected an integer >= 0, got "${value}".`);
  }
  return n;
}

/** A fraction in [0, 1]. */
export function parseRatio(value: string): number {
  const n = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(n) || n < 0 || n > 1) {
    throw new InvalidArgumentError(`Expected a number between 0 and 1, got "${value}".`);
  }
  return n;
}
