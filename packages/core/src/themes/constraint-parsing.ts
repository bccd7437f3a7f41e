/**
 * Parsing of user-supplied selection constraints
 *
 * Each parser throws InvalidConstraintError with the raw input attached, so a
 * bad option is reported before the corpus is opened.
 */

import { InvalidConstraintError } from '../errors.js';

import { isTacticalTheme, type TacticalTheme } from './tactical-themes.js';

/**
 * Tactical and mate shares of a mixed set
 */
export interface MixRatio {
  tactical: number;
  mate: number;
}

function splitList(input: string): string[] {
  return input
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Parse a comma-separated theme list
 * @throws InvalidConstraintError on an empty list or unknown theme names
 */
export function validateThemes(input: string): TacticalTheme[] {
  const names = splitList(input);
  if (names.length === 0) {
    throw new InvalidConstraintError('No themes given', input);
  }

  const unknown = names.filter((name) => !isTacticalTheme(name));
  if (unknown.length > 0) {
    throw new InvalidConstraintError(`Invalid themes: ${unknown.join(', ')}`, input);
  }

  return [...new Set(names.filter(isTacticalTheme))];
}

/**
 * Parse a mix ratio "tactical:mate", e.g. "70:30"
 * @throws InvalidConstraintError unless both parts are integers summing to 100
 */
export function parseMixRatio(input: string): MixRatio {
  const match = /^\s*(\d+)\s*:\s*(\d+)\s*$/.exec(input);
  if (!match) {
    throw new InvalidConstraintError(
      `Invalid mix ratio "${input}". Expected X:Y where X + Y = 100`,
      input,
    );
  }

  const tactical = Number(match[1]);
  const mate = Number(match[2]);
  if (tactical + mate !== 100) {
    throw new InvalidConstraintError(
      `Mix ratio parts must sum to 100, got ${tactical + mate}`,
      input,
    );
  }

  return { tactical, mate };
}

/**
 * Parse a comma-separated list of positive integers, e.g. "1,2,3".
 * Duplicates are dropped, first occurrence order is kept.
 * @throws InvalidConstraintError on an empty list or a non-positive entry
 */
export function parsePositiveIntList(input: string): number[] {
  const items = splitList(input);
  if (items.length === 0) {
    throw new InvalidConstraintError('Expected a comma-separated list of numbers', input);
  }

  const values: number[] = [];
  for (const item of items) {
    const value = /^\d+$/.test(item) ? Number(item) : Number.NaN;
    if (!Number.isSafeInteger(value) || value < 1) {
      throw new InvalidConstraintError(`"${item}" is not a positive integer`, input);
    }
    if (!values.includes(value)) {
      values.push(value);
    }
  }
  return values;
}
