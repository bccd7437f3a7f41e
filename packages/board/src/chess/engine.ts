/**
 * Board State Engine contract
 *
 * The validator and the notation renderer only touch positions through this
 * interface, so a test can wrap or replace the rules engine.
 */

import type { Side } from '@matebook/types';

import { ChessPosition, type LegalMove } from './position.js';

export interface BoardEngine {
  /**
   * @throws InvalidFenError when the encoding is malformed
   */
  initialPosition(fen: string): ChessPosition;
  /**
   * Apply a UCI move, returning a new position
   * @throws IllegalMoveError when the move is not legal in the position
   */
  applyMove(position: ChessPosition, move: string): ChessPosition;
  /**
   * Apply a move taken from `legalMoves(position)`
   * @throws IllegalMoveError when the move does not apply to the position
   */
  applyLegalMove(position: ChessPosition, move: LegalMove): ChessPosition;
  isInCheck(position: ChessPosition): boolean;
  /** True iff the side to move is in check and has no legal move */
  isCheckmate(position: ChessPosition): boolean;
  sideToMove(position: ChessPosition): Side;
  legalMoves(position: ChessPosition): LegalMove[];
  toFen(position: ChessPosition): string;
}

/**
 * Default engine backed by chess.js
 */
export const chessEngine: BoardEngine = {
  initialPosition: (fen) => ChessPosition.fromFen(fen),
  applyMove: (position, move) => position.play(move),
  applyLegalMove: (position, move) => position.playMove(move),
  isInCheck: (position) => position.isCheck(),
  isCheckmate: (position) => position.isCheckmate(),
  sideToMove: (position) => position.sideToMove(),
  legalMoves: (position) => position.legalMoves(),
  toFen: (position) => position.fen(),
};
