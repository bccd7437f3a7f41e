/**
 * @matebook/board - Board state engine for matebook
 *
 * This package handles:
 * - Position handling and full move legality (chess.js)
 * - The UCI move grammar used by the puzzle corpus
 * - The BoardEngine capability contract consumed by the validator
 * - Algebraic notation for solution lines
 * - ASCII board diagrams for terminal previews
 */

export const VERSION = '0.1.0';

export { ChessPosition, STARTING_FEN } from './chess/position.js';
export type { LegalMove, BoardPiece } from './chess/position.js';

export { chessEngine } from './chess/engine.js';
export type { BoardEngine } from './chess/engine.js';

export {
  parseUciMove,
  formatUciMove,
  isUciMoveList,
  isSquare,
  isPromotionPiece,
} from './chess/uci.js';
export type { UciMove, PromotionPiece } from './chess/uci.js';

export {
  formatAlgebraic,
  iterateNotation,
  renderNotation,
  withNotation,
} from './notation/index.js';
export type { CheckMarker } from './notation/index.js';

export { renderBoard, describePosition, perspectiveFor } from './chess/board-visualizer.js';
export type { Perspective, BoardRenderOptions } from './chess/board-visualizer.js';

export { BoardError, InvalidFenError, IllegalMoveError } from './errors.js';
