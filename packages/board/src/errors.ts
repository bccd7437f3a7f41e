/**
 * Error classes for board operations
 */

/**
 * Base class for errors raised by the board engine
 */
export class BoardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BoardError';
  }
}

/**
 * Error thrown when a FEN string is invalid
 */
export class InvalidFenError extends BoardError {
  constructor(public readonly fen: string) {
    super(`Invalid FEN: ${fen}`);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when a move does not parse or is not legal in the position
 */
export class IllegalMoveError extends BoardError {
  constructor(
    public readonly move: string,
    public readonly fen: string,
  ) {
    super(`Illegal move "${move}" in position: ${fen}`);
    this.name = 'IllegalMoveError';
  }
}
