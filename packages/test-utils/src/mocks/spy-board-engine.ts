/**
 * Call-counting board engine for testing
 *
 * Delegates to a real engine and records every call, so tests can assert
 * how much board work a validation did.
 */

import { vi } from 'vitest';

import { chessEngine, type BoardEngine } from '@matebook/board';

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createSpyBoardEngine(base: BoardEngine = chessEngine) {
  const engine = {
    initialPosition: vi.fn(base.initialPosition),
    applyMove: vi.fn(base.applyMove),
    applyLegalMove: vi.fn(base.applyLegalMove),
    isInCheck: vi.fn(base.isInCheck),
    isCheckmate: vi.fn(base.isCheckmate),
    sideToMove: vi.fn(base.sideToMove),
    legalMoves: vi.fn(base.legalMoves),
    toFen: vi.fn(base.toFen),
  } satisfies BoardEngine;

  return {
    ...engine,
    /** Moves applied so far, in order */
    appliedMoves(): string[] {
      return engine.applyMove.mock.calls.map(([, move]) => move);
    },
  };
}

export type SpyBoardEngine = ReturnType<typeof createSpyBoardEngine>;
