/**
 * Puzzle Set Pipeline
 *
 * Coordinates building a puzzle set from corpus records:
 * 1. Check the selection request (fails before any record is read)
 * 2. Validate each record against the groups' criteria, in order
 * 3. Render solution notation for accepted puzzles
 * 4. Select under count, rating and ratio constraints
 */

import { chessEngine, withNotation, BoardError, type BoardEngine } from '@matebook/board';
import type { PuzzleRecord, ValidatedPuzzle } from '@matebook/types';

import { InvalidConstraintError } from '../errors.js';
import {
  validateConstraints,
  type SelectionConstraints,
  type SelectionGroup,
} from '../selection/constraints.js';
import { selectPuzzleGroups, type GroupSelection } from '../selection/puzzle-selector.js';
import type { RandomSource } from '../selection/random.js';
import { validatePuzzle } from '../validator/puzzle-validator.js';

/**
 * What to build. A single group means an unmixed set.
 */
export interface PuzzleSetRequest {
  groups: readonly SelectionGroup[];
  targetCount: number;
  minRating?: number;
  maxRating?: number;
  progressive?: boolean;
}

export type PipelinePhase = 'validating' | 'rendering' | 'selecting' | 'complete';

/**
 * Progress callback. `total` is absent while the record count is unknown.
 */
export type ProgressCallback = (phase: PipelinePhase, current: number, total?: number) => void;

export interface PipelineOptions {
  /** Board engine for replay and notation (default: chess.js) */
  engine?: BoardEngine;
  /** Random source for sampling (default: Math.random) */
  random?: RandomSource;
  onProgress?: ProgressCallback;
}

export interface PuzzleSetStats {
  /** Records read */
  examined: number;
  /** Records accepted by some group's criterion */
  accepted: number;
  rejected: number;
  /** Accepted puzzles dropped because their notation could not be rendered */
  renderFailures: number;
  requested: number;
  selected: number;
  perGroup: GroupSelection[];
}

export interface PuzzleSet {
  puzzles: ValidatedPuzzle[];
  stats: PuzzleSetStats;
}

/**
 * Builds puzzle sets from record streams
 */
export class PuzzleSetPipeline {
  private readonly engine: BoardEngine;
  private readonly random: RandomSource;
  private readonly onProgress: ProgressCallback | undefined;

  constructor(options: PipelineOptions = {}) {
    this.engine = options.engine ?? chessEngine;
    this.random = options.random ?? Math.random;
    this.onProgress = options.onProgress;
  }

  /**
   * Build a puzzle set
   *
   * @throws InvalidConstraintError when the request is invalid
   */
  async build(
    records: Iterable<PuzzleRecord> | AsyncIterable<PuzzleRecord>,
    request: PuzzleSetRequest,
  ): Promise<PuzzleSet> {
    if (request.groups.length === 0) {
      throw new InvalidConstraintError('At least one selection group is required', '');
    }
    const constraints = this.toConstraints(request);
    validateConstraints(constraints);

    const total = Array.isArray(records) ? records.length : undefined;
    const validated: ValidatedPuzzle[] = [];
    let examined = 0;

    for await (const record of records) {
      examined++;
      const puzzle = this.validate(record, request.groups);
      if (puzzle) {
        validated.push(puzzle);
      }
      this.reportProgress('validating', examined, total);
    }

    const rendered: ValidatedPuzzle[] = [];
    for (const [index, puzzle] of validated.entries()) {
      const withSolution = this.render(puzzle);
      if (withSolution) {
        rendered.push(withSolution);
      }
      this.reportProgress('rendering', index + 1, validated.length);
    }

    this.reportProgress('selecting', 0, 1);
    const selection = selectPuzzleGroups(rendered, constraints, this.random);
    this.reportProgress('complete', 1, 1);

    return {
      puzzles: selection.puzzles,
      stats: {
        examined,
        accepted: validated.length,
        rejected: examined - validated.length,
        renderFailures: validated.length - rendered.length,
        requested: request.targetCount,
        selected: selection.puzzles.length,
        perGroup: this.labelGroups(selection.groups, request.groups),
      },
    };
  }

  /**
   * First group whose criterion accepts the record wins
   */
  private validate(
    record: PuzzleRecord,
    groups: readonly SelectionGroup[],
  ): ValidatedPuzzle | null {
    for (const group of groups) {
      const puzzle = validatePuzzle(record, group.criterion, this.engine);
      if (puzzle) {
        return puzzle;
      }
    }
    return null;
  }

  private render(puzzle: ValidatedPuzzle): ValidatedPuzzle | null {
    try {
      return withNotation(puzzle, this.engine);
    } catch (error) {
      if (error instanceof BoardError) {
        return null;
      }
      throw error;
    }
  }

  private toConstraints(request: PuzzleSetRequest): SelectionConstraints {
    const constraints: {
      targetCount: number;
      minRating?: number;
      maxRating?: number;
      groups?: readonly SelectionGroup[];
      progressive?: boolean;
    } = { targetCount: request.targetCount };

    if (request.minRating !== undefined) {
      constraints.minRating = request.minRating;
    }
    if (request.maxRating !== undefined) {
      constraints.maxRating = request.maxRating;
    }
    // Ratios only apply to mixed sets
    if (request.groups.length > 1) {
      constraints.groups = request.groups;
    }
    if (request.progressive !== undefined) {
      constraints.progressive = request.progressive;
    }
    return constraints;
  }

  /**
   * An unmixed selection reports under its single group's label
   */
  private labelGroups(
    selected: GroupSelection[],
    groups: readonly SelectionGroup[],
  ): GroupSelection[] {
    const [only] = groups;
    if (groups.length !== 1 || !only) {
      return selected;
    }
    return selected.map((group) => ({ ...group, label: only.label }));
  }

  private reportProgress(phase: PipelinePhase, current: number, total: number | undefined): void {
    if (this.onProgress) {
      this.onProgress(phase, current, total);
    }
  }
}

/**
 * Build a puzzle set with a one-off pipeline
 */
export async function buildPuzzleSet(
  records: Iterable<PuzzleRecord> | AsyncIterable<PuzzleRecord>,
  request: PuzzleSetRequest,
  options: PipelineOptions = {},
): Promise<PuzzleSet> {
  return new PuzzleSetPipeline(options).build(records, request);
}
