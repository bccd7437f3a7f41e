/**
 * Algebraic notation for solution lines
 *
 * Notation is derived from the legal move list of the position the move is
 * played in, so disambiguation and capture marks always agree with the board.
 */

import type { ValidatedPuzzle } from '@matebook/types';

import { chessEngine, type BoardEngine } from '../chess/engine.js';
import type { LegalMove } from '../chess/position.js';
import { parseUciMove } from '../chess/uci.js';
import { IllegalMoveError } from '../errors.js';

/**
 * Suffix for the position a move leads to
 */
export type CheckMarker = '' | '+' | '#';

function pieceLetter(piece: LegalMove['piece']): string {
  return piece === 'p' ? '' : piece.toUpperCase();
}

/**
 * Origin qualifier needed when another piece of the same type can reach the
 * same square: file if unique, else rank if unique, else both.
 */
function disambiguation(move: LegalMove, legalMoves: readonly LegalMove[]): string {
  if (move.piece === 'p' || move.piece === 'k') {
    return '';
  }

  const rivals = legalMoves.filter(
    (candidate) =>
      candidate.piece === move.piece && candidate.to === move.to && candidate.from !== move.from,
  );
  if (rivals.length === 0) {
    return '';
  }

  const file = move.from.charAt(0);
  const rank = move.from.charAt(1);
  if (!rivals.some((rival) => rival.from.charAt(0) === file)) {
    return file;
  }
  if (!rivals.some((rival) => rival.from.charAt(1) === rank)) {
    return rank;
  }
  return move.from;
}

/**
 * Format one move in standard algebraic notation
 *
 * @param move - The move, as listed among `legalMoves`
 * @param legalMoves - Every legal move of the position the move is played in
 * @param marker - Check or mate marker of the resulting position
 */
export function formatAlgebraic(
  move: LegalMove,
  legalMoves: readonly LegalMove[],
  marker: CheckMarker = '',
): string {
  if (move.castle === 'kingside') {
    return `O-O${marker}`;
  }
  if (move.castle === 'queenside') {
    return `O-O-O${marker}`;
  }

  const isCapture = move.captured !== undefined || move.enPassant;
  let san = pieceLetter(move.piece);

  if (move.piece === 'p') {
    if (isCapture) {
      san += move.from.charAt(0);
    }
  } else {
    san += disambiguation(move, legalMoves);
  }

  if (isCapture) {
    san += 'x';
  }
  san += move.to;

  if (move.promotion) {
    san += `=${move.promotion.toUpperCase()}`;
  }

  return san + marker;
}

/**
 * Lazily render a solution line, one notation token per move.
 *
 * The generator is one-shot: it replays the line as it is consumed.
 *
 * @throws IllegalMoveError when a move does not apply to the position reached
 * @throws InvalidFenError when the starting position does not parse
 */
export function* iterateNotation(
  presentedPosition: string,
  moves: readonly string[],
  engine: BoardEngine = chessEngine,
): Generator<string, void, undefined> {
  let position = engine.initialPosition(presentedPosition);

  for (const uci of moves) {
    const parsed = parseUciMove(uci);
    const legalMoves = engine.legalMoves(position);
    const move = parsed
      ? legalMoves.find(
          (candidate) =>
            candidate.from === parsed.from &&
            candidate.to === parsed.to &&
            candidate.promotion === parsed.promotion,
        )
      : undefined;

    if (!move) {
      throw new IllegalMoveError(uci, engine.toFen(position));
    }

    const next = engine.applyLegalMove(position, move);
    let marker: CheckMarker = '';
    if (engine.isCheckmate(next)) {
      marker = '#';
    } else if (engine.isInCheck(next)) {
      marker = '+';
    }

    yield formatAlgebraic(move, legalMoves, marker);
    position = next;
  }
}

/**
 * Render a whole solution line
 */
export function renderNotation(
  presentedPosition: string,
  moves: readonly string[],
  engine: BoardEngine = chessEngine,
): string[] {
  return [...iterateNotation(presentedPosition, moves, engine)];
}

/**
 * Copy of a validated puzzle with its solution notation filled in
 */
export function withNotation(
  puzzle: ValidatedPuzzle,
  engine: BoardEngine = chessEngine,
): ValidatedPuzzle {
  return {
    ...puzzle,
    solutionNotation: renderNotation(puzzle.presentedPosition, puzzle.solutionMoves, engine),
  };
}
