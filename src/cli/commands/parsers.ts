/**
 * Option Parsers
 *
 * Commander argument parsers shared by the commands. Each throws
 * `InvalidArgumentError`, which commander reports as a usage error.
 *
 * @module cli/commands/parsers
 */

import { InvalidArgumentError } from 'commander';

/**
 * Parse an integer ≥ 1 (result counts).
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a whole number of at least 1.');
  }
  return parsed;
}

/**
 * Parse an integer ≥ 0 (rupees, days, kilometres, ids).
 */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a whole number of at least 0.');
  }
  return parsed;
}

/**
 * Parse a rating between 0 and 5.
 */
export function parseRating(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed) || parsed < 0 || parsed > 5) {
    throw new InvalidArgumentError('Must be a number between 0 and 5.');
  }
  return parsed;
}

/**
 * Split a comma-separated list, dropping blanks.
 *
 * @example
 * ```typescript
 * parseList('nature, adventure,,'); // ['nature', 'adventure']
 * ```
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Accept one of a fixed set of choices.
 */
export function parseChoice<T extends string>(choices: readonly T[]): (value: string) => T {
  return (value: string): T => {
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
      throw new InvalidArgumentError(`Allowed choices are ${choices.join(', ')}.`);
    }
    return match;
  };
}
