/**
 * Selection constraints and their validation
 */

import type { Criterion } from '@matebook/types';

import { InvalidConstraintError } from '../errors.js';

/**
 * One share of a mixed selection
 */
export interface SelectionGroup {
  /** Unique name, used in summaries */
  readonly label: string;
  /** Integer share of the target count; shares sum to 100 */
  readonly percentage: number;
  /** Membership test for validated puzzles */
  readonly criterion: Criterion;
}

export interface SelectionConstraints {
  /** Number of puzzles wanted */
  readonly targetCount: number;
  /** Inclusive lower rating bound */
  readonly minRating?: number;
  /** Inclusive upper rating bound */
  readonly maxRating?: number;
  /** Ratio split; absent means one uniform sample from the whole pool */
  readonly groups?: readonly SelectionGroup[];
  /** Order the result by ascending rating */
  readonly progressive?: boolean;
}

function checkRating(value: number | undefined, name: string): void {
  if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
    throw new InvalidConstraintError(`${name} must be a non-negative number`, String(value));
  }
}

/**
 * @throws InvalidConstraintError when the constraints cannot be satisfied as stated
 */
export function validateConstraints(constraints: SelectionConstraints): void {
  const { targetCount, minRating, maxRating, groups } = constraints;

  if (!Number.isInteger(targetCount) || targetCount < 0) {
    throw new InvalidConstraintError(
      'Target count must be a non-negative integer',
      String(targetCount),
    );
  }

  checkRating(minRating, 'Minimum rating');
  checkRating(maxRating, 'Maximum rating');
  if (minRating !== undefined && maxRating !== undefined && minRating > maxRating) {
    throw new InvalidConstraintError(
      `Minimum rating ${minRating} is above maximum rating ${maxRating}`,
      `${minRating}-${maxRating}`,
    );
  }

  if (groups === undefined) {
    return;
  }
  if (groups.length === 0) {
    throw new InvalidConstraintError('At least one selection group is required', '');
  }

  const labels = new Set<string>();
  let total = 0;
  for (const group of groups) {
    if (group.label.trim() === '') {
      throw new InvalidConstraintError('Selection group labels must not be empty', group.label);
    }
    if (labels.has(group.label)) {
      throw new InvalidConstraintError(`Duplicate selection group "${group.label}"`, group.label);
    }
    labels.add(group.label);

    if (!Number.isInteger(group.percentage) || group.percentage < 0 || group.percentage > 100) {
      throw new InvalidConstraintError(
        `Percentage for "${group.label}" must be an integer between 0 and 100`,
        String(group.percentage),
      );
    }
    total += group.percentage;
  }

  if (total !== 100) {
    throw new InvalidConstraintError(
      `Group percentages must sum to 100, got ${total}`,
      groups.map((group) => group.percentage).join(':'),
    );
  }
}
