import { afterEach, describe, it, expect, vi } from 'vitest';

import type { ValidatedPuzzle } from '@matebook/types';

import {
  ChessPosition,
  IllegalMoveError,
  InvalidFenError,
  STARTING_FEN,
  iterateNotation,
  renderNotation,
  withNotation,
} from '../index.js';

function presentedAfter(fen: string, setupMove: string): string {
  return ChessPosition.fromFen(fen).play(setupMove).fen();
}

describe('renderNotation', () => {
  describe('mating lines', () => {
    it('marks a one-move mate', () => {
      const presented = presentedAfter(
        'r1bqkbnr/pppp1ppp/2n5/4p2Q/2B1P3/8/PPPP1PPP/RNB1K1NR b KQkq - 3 3',
        'g8f6',
      );
      expect(renderNotation(presented, ['h5f7'])).toEqual(['Qxf7#']);
    });

    it('marks check, capture and mate along a back-rank line', () => {
      const presented = presentedAfter('1r4k1/5ppp/8/8/8/8/4RPPP/4R1K1 b - - 0 1', 'b8a8');
      expect(renderNotation(presented, ['e2e8', 'a8e8', 'e1e8'])).toEqual([
        'Re8+',
        'Rxe8',
        'Rxe8#',
      ]);
    });

    it('puts the mate marker on the final token only', () => {
      const presented = presentedAfter('1r4k1/5ppp/8/8/8/8/4RPPP/4R1K1 b - - 0 1', 'b8a8');
      const tokens = renderNotation(presented, ['e2e8', 'a8e8', 'e1e8']);
      expect(tokens.filter((token) => token.endsWith('#'))).toEqual(['Rxe8#']);
      expect(tokens.at(-1)).toBe('Rxe8#');
    });
  });

  describe('disambiguation', () => {
    it('uses the file when it is unique', () => {
      expect(renderNotation('6k1/8/8/8/8/8/8/R4RK1 w - - 0 1', ['a1d1'])).toEqual(['Rad1']);
    });

    it('uses the rank when files coincide', () => {
      expect(renderNotation('6k1/8/8/R7/8/8/8/R5K1 w - - 0 1', ['a1a3'])).toEqual(['R1a3']);
    });

    it('uses the full square when neither is unique', () => {
      expect(renderNotation('6k1/8/8/8/8/Q7/8/Q1Q4K w - - 0 1', ['a1b2'])).toEqual(['Qa1b2']);
    });

    it('adds nothing when only one piece can reach the square', () => {
      expect(renderNotation('6k1/8/8/8/8/8/8/R5K1 w - - 0 1', ['a1a3'])).toEqual(['Ra3']);
    });
  });

  describe('special moves', () => {
    it('renders promotion with the promoted piece', () => {
      expect(renderNotation('6k1/P7/8/8/8/8/8/K7 w - - 0 1', ['a7a8q'])).toEqual(['a8=Q+']);
    });

    it('renders castling on both wings', () => {
      const fen = 'r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1';
      expect(renderNotation(fen, ['e1g1'])).toEqual(['O-O']);
      expect(renderNotation(fen, ['e1c1'])).toEqual(['O-O-O']);
    });

    it('renders en passant as a pawn capture', () => {
      expect(
        renderNotation('rnbqkbnr/ppp1p1pp/8/3pPp2/8/8/PPPP1PPP/RNBQKBNR w KQkq f6 0 3', ['e5f6']),
      ).toEqual(['exf6']);
    });

    it('renders plain pawn pushes and knight moves', () => {
      expect(renderNotation(STARTING_FEN, ['e2e4', 'g8f6'])).toEqual(['e4', 'Nf6']);
    });
  });

  describe('errors', () => {
    it('throws IllegalMoveError for a move that does not apply', () => {
      expect(() => renderNotation('6k1/8/8/8/8/8/8/R5K1 w - - 0 1', ['a1h8'])).toThrow(
        IllegalMoveError,
      );
    });

    it('throws IllegalMoveError for text that is not a move', () => {
      expect(() => renderNotation('6k1/8/8/8/8/8/8/R5K1 w - - 0 1', ['Ra3'])).toThrow(
        IllegalMoveError,
      );
    });

    it('throws InvalidFenError for a bad starting position', () => {
      expect(() => renderNotation('nope', ['e2e4'])).toThrow(InvalidFenError);
    });
  });
});

describe('iterateNotation', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists legal moves once per ply', () => {
    const presented = presentedAfter('1r4k1/5ppp/8/8/8/8/4RPPP/4R1K1 b - - 0 1', 'b8a8');
    const legalMoves = vi.spyOn(ChessPosition.prototype, 'legalMoves');

    expect([...iterateNotation(presented, ['e2e8', 'a8e8', 'e1e8'])]).toEqual([
      'Re8+',
      'Rxe8',
      'Rxe8#',
    ]);
    expect(legalMoves).toHaveBeenCalledTimes(3);
  });

  it('yields tokens lazily', () => {
    const tokens = iterateNotation('6k1/8/8/8/8/8/8/R5K1 w - - 0 1', ['a1a3', 'g8h8', 'xx']);
    expect(tokens.next().value).toBe('Ra3');
    expect(tokens.next().value).toBe('Kh8');
    expect(() => tokens.next()).toThrow(IllegalMoveError);
  });
});

describe('withNotation', () => {
  it('returns a copy with the notation filled in', () => {
    const presented = presentedAfter('1r4k1/5ppp/8/8/8/8/4RPPP/4R1K1 b - - 0 1', 'b8a8');
    const puzzle: ValidatedPuzzle = {
      id: 'backrank',
      position: '1r4k1/5ppp/8/8/8/8/4RPPP/4R1K1 b - - 0 1',
      rating: 1400,
      tags: ['mate', 'mateIn2'],
      sourceUrl: '',
      setupMove: 'b8a8',
      presentedPosition: presented,
      solverSide: 'first',
      solutionMoves: ['e2e8', 'a8e8', 'e1e8'],
      solutionNotation: [],
      mateDepth: 2,
      plyCount: 3,
    };

    const rendered = withNotation(puzzle);
    expect(rendered.solutionNotation).toEqual(['Re8+', 'Rxe8', 'Rxe8#']);
    expect(rendered).not.toBe(puzzle);
    expect(puzzle.solutionNotation).toEqual([]);
    expect(rendered.solutionMoves).toEqual(puzzle.solutionMoves);
  });
});
