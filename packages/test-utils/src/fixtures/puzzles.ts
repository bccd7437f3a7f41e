/**
 * Hand-checked puzzle records
 *
 * Each record's expected outcome is noted beside it; the presented positions
 * and notation are the values the validator and renderer must produce.
 */

import type { PuzzleRecord } from '@matebook/types';

/** Queen takes f7 with bishop support. Accepted as mate in 1. */
export const SCHOLAR_MATE_IN_1: PuzzleRecord = {
  id: 'm1Scholar',
  position: 'r1bqkbnr/pppp1ppp/2n5/4p2Q/2B1P3/8/PPPP1PPP/RNB1K1NR b KQkq - 3 3',
  moveList: ['g8f6', 'h5f7'],
  rating: 900,
  tags: ['mate', 'mateIn1', 'oneMove', 'opening'],
  sourceUrl: 'https://example.org/game/m1Scholar',
};

export const SCHOLAR_NOTATION = ['Qxf7#'];

/** Rook check, forced recapture, rook mate on the back rank. Accepted as mate in 2. */
export const BACK_RANK_MATE_IN_2: PuzzleRecord = {
  id: 'm2BackRank',
  position: '1r4k1/5ppp/8/8/8/8/4RPPP/4R1K1 b - - 0 1',
  moveList: ['b8a8', 'e2e8', 'a8e8', 'e1e8'],
  rating: 1400,
  tags: ['backRankMate', 'mate', 'mateIn2', 'middlegame', 'short'],
  sourceUrl: 'https://example.org/game/m2BackRank',
};

export const BACK_RANK_NOTATION = ['Re8+', 'Rxe8', 'Rxe8#'];

/** The solver walks into mate: the mate is delivered by the opponent. Rejected. */
export const OPPONENT_DELIVERS_MATE: PuzzleRecord = {
  id: 'm1Reversed',
  position: 'rnbqkbnr/pppppppp/8/8/8/5P2/PPPPP1PP/RNBQKBNR b KQkq - 0 1',
  moveList: ['e7e5', 'g2g4', 'd8h4'],
  rating: 600,
  tags: ['mate', 'mateIn1', 'opening'],
  sourceUrl: 'https://example.org/game/m1Reversed',
};

/** Queen "mates" through the h7 pawn. Rejected as illegal. */
export const ILLEGAL_MATE_IN_1: PuzzleRecord = {
  id: 'm1Illegal',
  position: 'r1bqkbnr/pppp1ppp/2n5/4p2Q/2B1P3/8/PPPP1PPP/RNB1K1NR b KQkq - 3 3',
  moveList: ['g8f6', 'h5h8'],
  rating: 950,
  tags: ['mate', 'mateIn1'],
  sourceUrl: '',
};

/** Knight check forks king and queen. Three-ply tactical puzzle. */
export const KNIGHT_FORK: PuzzleRecord = {
  id: 'tFork',
  position: '3q2k1/8/8/3N4/8/8/8/6K1 b - - 0 1',
  moveList: ['d8c8', 'd5e7', 'g8f7', 'e7c8'],
  rating: 1250,
  tags: ['advantage', 'fork', 'short'],
  sourceUrl: 'https://example.org/game/tFork',
};

export const KNIGHT_FORK_NOTATION = ['Ne7+', 'Kf7', 'Nxc8'];

/** Undefended rook. One-ply tactical puzzle. */
export const HANGING_ROOK: PuzzleRecord = {
  id: 'tHanging',
  position: '4k3/8/8/8/8/8/r7/R3K3 b - - 0 1',
  moveList: ['e8d8', 'a1a2'],
  rating: 700,
  tags: ['crushing', 'hangingPiece', 'oneMove'],
  sourceUrl: 'https://example.org/game/tHanging',
};

export const HANGING_ROOK_NOTATION = ['Rxa2'];

/** Every fixture record, valid and invalid */
export const ALL_FIXTURE_RECORDS: readonly PuzzleRecord[] = [
  SCHOLAR_MATE_IN_1,
  BACK_RANK_MATE_IN_2,
  OPPONENT_DELIVERS_MATE,
  ILLEGAL_MATE_IN_1,
  KNIGHT_FORK,
  HANGING_ROOK,
];
