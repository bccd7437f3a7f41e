/**
 * Fluent builders for puzzle test data
 */

import type { PuzzleRecord, Side, ValidatedPuzzle } from '@matebook/types';

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Fluent builder for PuzzleRecord instances. Defaults to a one-move mate.
 */
export class PuzzleRecordBuilder {
  private record: Mutable<PuzzleRecord>;

  constructor() {
    this.record = {
      id: 'p1',
      position: 'r1bqkbnr/pppp1ppp/2n5/4p2Q/2B1P3/8/PPPP1PPP/RNB1K1NR b KQkq - 3 3',
      moveList: ['g8f6', 'h5f7'],
      rating: 1500,
      tags: ['mate', 'mateIn1'],
      sourceUrl: '',
    };
  }

  withId(id: string): this {
    this.record.id = id;
    return this;
  }

  /**
   * Set the starting FEN and the full move list (setup move first)
   */
  withMoves(position: string, moveList: readonly string[]): this {
    this.record.position = position;
    this.record.moveList = [...moveList];
    return this;
  }

  withRating(rating: number): this {
    this.record.rating = rating;
    return this;
  }

  withTags(...tags: string[]): this {
    this.record.tags = tags;
    return this;
  }

  withSourceUrl(sourceUrl: string): this {
    this.record.sourceUrl = sourceUrl;
    return this;
  }

  build(): PuzzleRecord {
    return { ...this.record, moveList: [...this.record.moveList], tags: [...this.record.tags] };
  }
}

/**
 * Create a new PuzzleRecordBuilder
 */
export function puzzleRecord(): PuzzleRecordBuilder {
  return new PuzzleRecordBuilder();
}

/**
 * Fluent builder for ValidatedPuzzle instances, for selection tests that
 * never touch a board.
 */
export class ValidatedPuzzleBuilder {
  private puzzle: Mutable<ValidatedPuzzle>;

  constructor() {
    this.puzzle = {
      id: 'v1',
      position: '8/8/8/8/8/8/8/4K2k w - - 0 1',
      rating: 1500,
      tags: [],
      sourceUrl: '',
      setupMove: 'e1d1',
      presentedPosition: '8/8/8/8/8/8/8/3K3k b - - 1 1',
      solverSide: 'second',
      solutionMoves: ['h1g2'],
      solutionNotation: [],
      plyCount: 1,
    };
  }

  withId(id: string): this {
    this.puzzle.id = id;
    return this;
  }

  withPresentedPosition(fen: string): this {
    this.puzzle.presentedPosition = fen;
    return this;
  }

  withRating(rating: number): this {
    this.puzzle.rating = rating;
    return this;
  }

  withTags(...tags: string[]): this {
    this.puzzle.tags = tags;
    return this;
  }

  withSolverSide(side: Side): this {
    this.puzzle.solverSide = side;
    return this;
  }

  /**
   * Set the solution; the ply count follows its length
   */
  withSolution(moves: readonly string[], notation: readonly string[] = []): this {
    this.puzzle.solutionMoves = [...moves];
    this.puzzle.solutionNotation = [...notation];
    this.puzzle.plyCount = moves.length;
    return this;
  }

  asMateIn(depth: number): this {
    this.puzzle.mateDepth = depth;
    return this;
  }

  build(): ValidatedPuzzle {
    return { ...this.puzzle };
  }
}

/**
 * Create a new ValidatedPuzzleBuilder
 */
export function validatedPuzzle(): ValidatedPuzzleBuilder {
  return new ValidatedPuzzleBuilder();
}

/**
 * `count` distinct validated puzzles with ids `${prefix}1..N`
 *
 * @param configure - Applied to each builder before it is built
 */
export function createPuzzlePool(
  count: number,
  prefix: string,
  configure: (builder: ValidatedPuzzleBuilder, index: number) => ValidatedPuzzleBuilder = (b) => b,
): ValidatedPuzzle[] {
  return Array.from({ length: count }, (_, index) =>
    configure(validatedPuzzle().withId(`${prefix}${index + 1}`), index).build(),
  );
}
