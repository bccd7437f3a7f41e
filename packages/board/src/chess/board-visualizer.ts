/**
 * ASCII board rendering for terminal previews
 */

import { sideLabel, type Side } from '@matebook/types';

import { ChessPosition } from './position.js';

/**
 * Board orientation perspective
 */
export type Perspective = 'white' | 'black';

/**
 * Options for board rendering
 */
export interface BoardRenderOptions {
  /** Board orientation (default: 'white') */
  perspective?: Perspective;
}

/**
 * Orientation that puts the given side at the bottom
 */
export function perspectiveFor(side: Side): Perspective {
  return side === 'first' ? 'white' : 'black';
}

/**
 * Render a chess position as an ASCII board
 *
 * ```
 *    a   b   c   d   e   f   g   h
 * 8 [r] [n] [b] [q] [k] [b] [n] [r]  8
 * 7 [p] [p] [p] [p] [p] [p] [p] [p]  7
 * 6  .   .   .   .   .   .   .   .   6
 * ...
 * ```
 *
 * Uppercase = White, lowercase = Black (FEN convention).
 */
export function renderBoard(fen: string, options?: BoardRenderOptions): string {
  const perspective = options?.perspective ?? 'white';
  const board = new ChessPosition(fen).board();

  const files =
    perspective === 'white'
      ? ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h']
      : ['h', 'g', 'f', 'e', 'd', 'c', 'b', 'a'];
  const rankIndices = perspective === 'white' ? [0, 1, 2, 3, 4, 5, 6, 7] : [7, 6, 5, 4, 3, 2, 1, 0];

  const lines: string[] = [];
  lines.push(`   ${files.join('   ')}`);

  for (const rankIdx of rankIndices) {
    const rankNum = 8 - rankIdx;
    const squares: string[] = [];

    for (let fileIdx = 0; fileIdx < 8; fileIdx++) {
      const actualFileIdx = perspective === 'white' ? fileIdx : 7 - fileIdx;
      const piece = board[rankIdx]?.[actualFileIdx];

      if (piece) {
        const symbol = piece.color === 'w' ? piece.type.toUpperCase() : piece.type.toLowerCase();
        squares.push(`[${symbol}]`);
      } else {
        squares.push(' . ');
      }
    }

    lines.push(`${rankNum} ${squares.join(' ')}  ${rankNum}`);
  }

  lines.push(`   ${files.join('   ')}`);

  return lines.join('\n');
}

/**
 * FEN, side to move and board, oriented for the side to move
 */
export function describePosition(fen: string, options?: { includeFen?: boolean }): string {
  const side = new ChessPosition(fen).sideToMove();
  const parts: string[] = [];

  if (options?.includeFen !== false) {
    parts.push(`FEN: ${fen}`);
  }
  parts.push(`${sideLabel(side)} to move`);
  parts.push(renderBoard(fen, { perspective: perspectiveFor(side) }));

  return parts.join('\n');
}
