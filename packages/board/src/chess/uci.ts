import type { Square } from 'chess.js';

/**
 * Pieces a pawn may promote to, in UCI spelling
 */
export type PromotionPiece = 'q' | 'r' | 'b' | 'n';

/**
 * A move in the compact corpus grammar: origin, destination, optional promotion
 */
export interface UciMove {
  readonly from: Square;
  readonly to: Square;
  readonly promotion?: PromotionPiece;
}

const SQUARE_PATTERN = /^[a-h][1-8]$/;
const UCI_PATTERN = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

export function isSquare(text: string): text is Square {
  return SQUARE_PATTERN.test(text);
}

export function isPromotionPiece(text: string): text is PromotionPiece {
  return text === 'q' || text === 'r' || text === 'b' || text === 'n';
}

/**
 * Parse a UCI move such as "e2e4" or "e7e8q"
 * @returns The parsed move, or null when the text is not a UCI move
 */
export function parseUciMove(text: string): UciMove | null {
  const match = UCI_PATTERN.exec(text.trim().toLowerCase());
  if (!match) {
    return null;
  }

  const from = match[1] ?? '';
  const to = match[2] ?? '';
  const promotion = match[3];
  if (!isSquare(from) || !isSquare(to) || from === to) {
    return null;
  }

  if (promotion !== undefined && isPromotionPiece(promotion)) {
    return { from, to, promotion };
  }
  return { from, to };
}

/**
 * Check whether every move in a list parses as UCI
 */
export function isUciMoveList(moves: readonly string[]): boolean {
  return moves.every((move) => parseUciMove(move) !== null);
}

/**
 * Format a move back to UCI text
 */
export function formatUciMove(move: UciMove): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`;
}
