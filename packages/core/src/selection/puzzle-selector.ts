/**
 * Selection Engine
 *
 * Rating filter, first-occurrence deduplication, group assignment and
 * sampling without replacement. Falling short of the target is not an error:
 * the caller compares `requested` with `selected`.
 */

import { puzzleKey, type ValidatedPuzzle } from '@matebook/types';

import { matchesCriterion } from '../validator/criterion-matcher.js';

import {
  validateConstraints,
  type SelectionConstraints,
  type SelectionGroup,
} from './constraints.js';
import { randomIndex, type RandomSource } from './random.js';

/**
 * Outcome for one group of a selection
 */
export interface GroupSelection {
  label: string;
  /** Share of the target count assigned to the group */
  requested: number;
  /** Distinct candidates that fell into the group */
  available: number;
  selected: number;
}

export interface SelectionResult {
  puzzles: ValidatedPuzzle[];
  groups: GroupSelection[];
}

/**
 * Split a target count by integer percentages. Each share is floored and the
 * last group takes the remainder, so the shares always sum to `targetCount`.
 */
export function allocateCounts(
  targetCount: number,
  groups: readonly Pick<SelectionGroup, 'percentage'>[],
): number[] {
  const counts = groups.map((group) => Math.floor((targetCount * group.percentage) / 100));
  const assigned = counts.reduce((sum, count) => sum + count, 0);
  const last = counts.length - 1;
  if (last >= 0) {
    counts[last] = (counts[last] ?? 0) + targetCount - assigned;
  }
  return counts;
}

/**
 * Uniform sample without replacement (partial Fisher-Yates).
 * Returns every item, shuffled, when fewer than `count` are available.
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: RandomSource = Math.random,
): T[] {
  const pool = [...items];
  const take = Math.min(Math.max(count, 0), pool.length);

  for (let i = 0; i < take; i++) {
    const j = i + randomIndex(pool.length - i, random);
    const picked = pool[j];
    const current = pool[i];
    if (picked !== undefined && current !== undefined) {
      pool[i] = picked;
      pool[j] = current;
    }
  }

  return pool.slice(0, take);
}

/**
 * Stable ascending sort by rating
 */
export function orderByRating<T extends { readonly rating: number }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => a.rating - b.rating);
}

function withinRating(puzzle: ValidatedPuzzle, constraints: Pick<SelectionConstraints, 'minRating' | 'maxRating'>): boolean {
  if (constraints.minRating !== undefined && puzzle.rating < constraints.minRating) {
    return false;
  }
  if (constraints.maxRating !== undefined && puzzle.rating > constraints.maxRating) {
    return false;
  }
  return true;
}

/**
 * Rating-filtered candidates with duplicate (id, presented position) pairs
 * removed. The first occurrence wins.
 */
export function dedupePuzzles(
  candidates: Iterable<ValidatedPuzzle>,
  constraints: Pick<SelectionConstraints, 'minRating' | 'maxRating'> = {},
): ValidatedPuzzle[] {
  const seen = new Set<string>();
  const unique: ValidatedPuzzle[] = [];

  for (const puzzle of candidates) {
    if (!withinRating(puzzle, constraints)) {
      continue;
    }
    const key = puzzleKey(puzzle);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(puzzle);
  }

  return unique;
}

/**
 * Select puzzles and report per-group counts
 *
 * @throws InvalidConstraintError when the constraints are invalid
 */
export function selectPuzzleGroups(
  candidates: Iterable<ValidatedPuzzle>,
  constraints: SelectionConstraints,
  random: RandomSource = Math.random,
): SelectionResult {
  validateConstraints(constraints);

  const pool = dedupePuzzles(candidates, constraints);
  const groups = constraints.groups;
  let result: SelectionResult;

  if (groups === undefined) {
    const puzzles = sampleWithoutReplacement(pool, constraints.targetCount, random);
    result = {
      puzzles,
      groups: [
        {
          label: 'all',
          requested: constraints.targetCount,
          available: pool.length,
          selected: puzzles.length,
        },
      ],
    };
  } else {
    const buckets: ValidatedPuzzle[][] = groups.map(() => []);
    for (const puzzle of pool) {
      const index = groups.findIndex((group) => matchesCriterion(puzzle, group.criterion));
      buckets[index]?.push(puzzle);
    }

    const counts = allocateCounts(constraints.targetCount, groups);
    const puzzles: ValidatedPuzzle[] = [];
    const summaries: GroupSelection[] = [];

    groups.forEach((group, index) => {
      const bucket = buckets[index] ?? [];
      const requested = counts[index] ?? 0;
      const picked = sampleWithoutReplacement(bucket, requested, random);
      puzzles.push(...picked);
      summaries.push({
        label: group.label,
        requested,
        available: bucket.length,
        selected: picked.length,
      });
    });

    result = { puzzles, groups: summaries };
  }

  if (constraints.progressive) {
    result.puzzles = orderByRating(result.puzzles);
  }
  return result;
}

/**
 * Select up to `targetCount` puzzles under the given constraints
 *
 * @param random - Source for sampling (default: Math.random)
 * @throws InvalidConstraintError when the constraints are invalid
 */
export function selectPuzzles(
  candidates: Iterable<ValidatedPuzzle>,
  constraints: SelectionConstraints,
  random: RandomSource = Math.random,
): ValidatedPuzzle[] {
  return selectPuzzleGroups(candidates, constraints, random).puzzles;
}
