import { Chess, type Move, type PieceSymbol, type Square } from 'chess.js';

import type { Side } from '@matebook/types';

import { InvalidFenError, IllegalMoveError } from '../errors.js';

import { parseUciMove, type UciMove } from './uci.js';

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/**
 * A legal move as seen from the position it is played in
 */
export interface LegalMove {
  from: Square;
  to: Square;
  /** Type of the moving piece */
  piece: PieceSymbol;
  /** Type of the captured piece (also set for en passant) */
  captured?: PieceSymbol;
  promotion?: PieceSymbol;
  castle?: 'kingside' | 'queenside';
  enPassant: boolean;
}

/**
 * Piece on a board square
 */
export interface BoardPiece {
  type: PieceSymbol;
  color: 'w' | 'b';
}

function toLegalMove(move: Move): LegalMove {
  const legal: LegalMove = {
    from: move.from,
    to: move.to,
    piece: move.piece,
    enPassant: move.flags.includes('e'),
  };
  // Assigned conditionally to satisfy exactOptionalPropertyTypes
  if (move.captured) {
    legal.captured = move.captured;
  }
  if (move.promotion) {
    legal.promotion = move.promotion;
  }
  if (move.flags.includes('k')) {
    legal.castle = 'kingside';
  } else if (move.flags.includes('q')) {
    legal.castle = 'queenside';
  }
  return legal;
}

/**
 * A chess position wrapper around chess.js
 *
 * Positions are values: `play` returns a new position and leaves this one
 * untouched, so two validations never share a board.
 */
export class ChessPosition {
  private readonly chess: Chess;

  /**
   * @throws InvalidFenError if the FEN is invalid
   */
  constructor(fen?: string) {
    if (fen !== undefined) {
      try {
        this.chess = new Chess(fen);
      } catch {
        throw new InvalidFenError(fen);
      }
    } else {
      this.chess = new Chess();
    }
  }

  /**
   * Create a position from the standard starting position
   */
  static startingPosition(): ChessPosition {
    return new ChessPosition();
  }

  /**
   * Create a position from a FEN string
   * @throws InvalidFenError if the FEN is invalid
   */
  static fromFen(fen: string): ChessPosition {
    return new ChessPosition(fen);
  }

  /**
   * Get the current position as a FEN string
   */
  fen(): string {
    return this.chess.fen();
  }

  /**
   * Get whose turn it is
   */
  turn(): 'w' | 'b' {
    return this.chess.turn();
  }

  /**
   * Side to move in color-neutral naming
   */
  sideToMove(): Side {
    return this.chess.turn() === 'w' ? 'first' : 'second';
  }

  /**
   * Check if the side to move is in check
   */
  isCheck(): boolean {
    return this.chess.isCheck();
  }

  /**
   * Check if the side to move is checkmated
   */
  isCheckmate(): boolean {
    return this.chess.isCheckmate();
  }

  /**
   * Check if the position is stalemate
   */
  isStalemate(): boolean {
    return this.chess.isStalemate();
  }

  /**
   * All legal moves for the side to move
   */
  legalMoves(): LegalMove[] {
    return this.chess.moves({ verbose: true }).map(toLegalMove);
  }

  /**
   * Find the legal move matching a UCI move.
   * A pawn move to the last rank only matches with its promotion piece.
   */
  findMove(move: UciMove): LegalMove | undefined {
    return this.legalMoves().find(
      (candidate) =>
        candidate.from === move.from &&
        candidate.to === move.to &&
        candidate.promotion === move.promotion,
    );
  }

  /**
   * Check if a UCI move is legal here
   */
  isLegalMove(uci: string): boolean {
    const move = parseUciMove(uci);
    return move !== null && this.findMove(move) !== undefined;
  }

  /**
   * Play a UCI move and return the resulting position
   * @throws IllegalMoveError if the move does not parse or is not legal
   */
  play(uci: string): ChessPosition {
    const move = parseUciMove(uci);
    const legal = move ? this.findMove(move) : undefined;
    if (!legal) {
      throw new IllegalMoveError(uci, this.chess.fen());
    }
    return this.playMove(legal);
  }

  /**
   * Play a move taken from `legalMoves()` without searching the move list again
   * @throws IllegalMoveError if the move does not apply here
   */
  playMove(move: LegalMove): ChessPosition {
    const fenBefore = this.chess.fen();
    const next = new ChessPosition(fenBefore);
    // Build move object conditionally to satisfy exactOptionalPropertyTypes
    const moveObj: { from: string; to: string; promotion?: string } = {
      from: move.from,
      to: move.to,
    };
    if (move.promotion) {
      moveObj.promotion = move.promotion;
    }
    try {
      next.chess.move(moveObj);
    } catch {
      throw new IllegalMoveError(`${move.from}${move.to}${move.promotion ?? ''}`, fenBefore);
    }
    return next;
  }

  /**
   * Get the piece at a square
   */
  getPiece(square: Square): BoardPiece | undefined {
    const piece = this.chess.get(square);
    if (!piece) return undefined;
    return { type: piece.type, color: piece.color };
  }

  /**
   * Get the board as an 8x8 array
   * @returns 2D array where [0][0] is a8 and [7][7] is h1
   */
  board(): Array<Array<BoardPiece | null>> {
    return this.chess
      .board()
      .map((rank) => rank.map((piece) => (piece ? { type: piece.type, color: piece.color } : null)));
  }
}
