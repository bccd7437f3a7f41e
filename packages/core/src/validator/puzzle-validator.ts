/**
 * Puzzle Validator
 *
 * Replays a record on a real board and decides whether it satisfies a
 * criterion. Every per-record problem (bad FEN, bad move text, illegal move,
 * wrong mate length) is a rejection, never an exception.
 */

import {
  BoardError,
  chessEngine,
  isUciMoveList,
  type BoardEngine,
  type ChessPosition,
} from '@matebook/board';
import type { Criterion, PuzzleRecord, ValidatedPuzzle } from '@matebook/types';

/**
 * A record after its setup move, before any criterion-specific check
 */
interface Presentation {
  puzzle: ValidatedPuzzle;
  position: ChessPosition;
}

/**
 * Integrity checks shared by every criterion, then the setup move.
 * The solution is every recorded move after the setup move.
 */
function present(record: PuzzleRecord, engine: BoardEngine): Presentation | null {
  if (record.id.trim() === '' || record.position.trim() === '') {
    return null;
  }

  const [setupMove, ...solutionMoves] = record.moveList;
  if (setupMove === undefined || solutionMoves.length === 0) {
    return null;
  }
  if (!isUciMoveList(record.moveList)) {
    return null;
  }

  const initial = engine.initialPosition(record.position);
  const position = engine.applyMove(initial, setupMove);

  return {
    position,
    puzzle: {
      id: record.id,
      position: record.position,
      rating: record.rating,
      tags: record.tags,
      sourceUrl: record.sourceUrl,
      setupMove,
      presentedPosition: engine.toFen(position),
      solverSide: engine.sideToMove(position),
      solutionMoves,
      solutionNotation: [],
      plyCount: solutionMoves.length,
    },
  };
}

/**
 * Forced mate delivered by the solver on exactly its `moves`-th move.
 * The solution is truncated to the mating move.
 */
function validateMate(
  record: PuzzleRecord,
  moves: number,
  engine: BoardEngine,
): ValidatedPuzzle | null {
  if (record.moveList.length < moves + 1) {
    return null;
  }
  if (!record.tags.includes('mate') || !record.tags.includes(`mateIn${moves}`)) {
    return null;
  }

  const presentation = present(record, engine);
  if (!presentation) {
    return null;
  }

  const { puzzle } = presentation;
  let position = presentation.position;

  for (const [ply, move] of puzzle.solutionMoves.entries()) {
    position = engine.applyMove(position, move);
    const solverMoves = Math.floor(ply / 2) + 1;

    if (engine.isCheckmate(position)) {
      // The mated side is to move, so the mover is the other side
      const solverDelivered = engine.sideToMove(position) !== puzzle.solverSide;
      if (!solverDelivered || solverMoves !== moves) {
        return null;
      }
      const solutionMoves = puzzle.solutionMoves.slice(0, ply + 1);
      return { ...puzzle, solutionMoves, mateDepth: moves, plyCount: solutionMoves.length };
    }

    if (solverMoves > moves) {
      return null;
    }
  }

  return null;
}

function validateAgainst(
  record: PuzzleRecord,
  criterion: Criterion,
  engine: BoardEngine,
): ValidatedPuzzle | null {
  switch (criterion.kind) {
    case 'mateIn':
      return validateMate(record, criterion.moves, engine);

    case 'plyCount': {
      const presentation = present(record, engine);
      return presentation && criterion.plies.includes(presentation.puzzle.plyCount)
        ? presentation.puzzle
        : null;
    }

    case 'theme': {
      if (!criterion.themes.some((theme) => record.tags.includes(theme))) {
        return null;
      }
      return present(record, engine)?.puzzle ?? null;
    }

    case 'any':
      return present(record, engine)?.puzzle ?? null;

    case 'oneOf':
      for (const sub of criterion.criteria) {
        const result = validateAgainst(record, sub, engine);
        if (result) {
          return result;
        }
      }
      return null;

    case 'allOf': {
      const results: ValidatedPuzzle[] = [];
      for (const sub of criterion.criteria) {
        const result = validateAgainst(record, sub, engine);
        if (!result) {
          return null;
        }
        results.push(result);
      }

      const [first] = results;
      if (!first) {
        return present(record, engine)?.puzzle ?? null;
      }
      const mateDepth = results.find((result) => result.mateDepth !== undefined)?.mateDepth;
      return mateDepth === undefined || first.mateDepth !== undefined
        ? first
        : { ...first, mateDepth };
    }
  }
}

/**
 * Validate a record against a criterion
 *
 * @param engine - Board engine used for the replay (default: chess.js)
 * @returns The validated puzzle, or null when the record is rejected
 */
export function validatePuzzle(
  record: PuzzleRecord,
  criterion: Criterion,
  engine: BoardEngine = chessEngine,
): ValidatedPuzzle | null {
  try {
    return validateAgainst(record, criterion, engine);
  } catch (error) {
    if (error instanceof BoardError) {
      return null;
    }
    throw error;
  }
}
