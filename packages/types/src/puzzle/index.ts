/**
 * Puzzle data model
 *
 * A PuzzleRecord is what the corpus says about a puzzle. A ValidatedPuzzle is
 * what survives replay on a real board: the presented position, the solver's
 * side and a trusted solution line.
 */

/**
 * Color-neutral side naming. `first` moves first in a game (white).
 */
export type Side = 'first' | 'second';

/**
 * Display label for a side
 */
export function sideLabel(side: Side): 'White' | 'Black' {
  return side === 'first' ? 'White' : 'Black';
}

/**
 * A raw puzzle as read from the corpus. Nothing here is trusted yet.
 */
export interface PuzzleRecord {
  /** Opaque identifier, unique per source */
  readonly id: string;
  /** FEN of the position before any move in `moveList` is applied */
  readonly position: string;
  /**
   * Moves in UCI grammar (`e2e4`, `e7e8q`). The first move is the setup move
   * played by the opponent; the rest is the claimed solution.
   */
  readonly moveList: readonly string[];
  /** Difficulty estimate, >= 0 */
  readonly rating: number;
  /** Corpus labels: correctness class (`mate`, `mateIn2`) and motifs (`fork`) */
  readonly tags: readonly string[];
  /** Reference to the source game, passed through unmodified */
  readonly sourceUrl: string;
}

/**
 * A record that passed validation.
 *
 * Built once by the validator, enriched once by the notation renderer
 * (which returns a new value), then read-only.
 */
export interface ValidatedPuzzle {
  readonly id: string;
  /** Position before the setup move (the record's `position`) */
  readonly position: string;
  readonly rating: number;
  readonly tags: readonly string[];
  readonly sourceUrl: string;
  /** The opponent's move that produces the presented position */
  readonly setupMove: string;
  /** FEN after the setup move: the diagram shown to the solver */
  readonly presentedPosition: string;
  /** Side to move in the presented position */
  readonly solverSide: Side;
  /** Solution in UCI, starting with the solver's first move */
  readonly solutionMoves: readonly string[];
  /** Algebraic notation for `solutionMoves`; empty until rendered */
  readonly solutionNotation: readonly string[];
  /** N when validated as a forced mate in N */
  readonly mateDepth?: number;
  /** Number of plies in `solutionMoves` */
  readonly plyCount: number;
}

/**
 * Identity used for deduplication: the same id with a different presented
 * position counts as a different puzzle.
 */
export function puzzleKey(puzzle: Pick<ValidatedPuzzle, 'id' | 'presentedPosition'>): string {
  return `${puzzle.id}\u0000${puzzle.presentedPosition}`;
}

/**
 * Number of moves the solver makes in a solution of `plyCount` plies
 */
export function solverMoveCount(plyCount: number): number {
  return Math.ceil(plyCount / 2);
}
