/**
 * @matebook/test-utils
 *
 * Shared fixtures, builders and mocks for matebook tests
 */

// Fixture loading
export { getFixturePath, getSampleCorpusPath } from './fixtures/loader.js';

// Hand-checked records
export {
  SCHOLAR_MATE_IN_1,
  SCHOLAR_NOTATION,
  BACK_RANK_MATE_IN_2,
  BACK_RANK_NOTATION,
  OPPONENT_DELIVERS_MATE,
  ILLEGAL_MATE_IN_1,
  KNIGHT_FORK,
  KNIGHT_FORK_NOTATION,
  HANGING_ROOK,
  HANGING_ROOK_NOTATION,
  ALL_FIXTURE_RECORDS,
} from './fixtures/puzzles.js';

// Builders
export {
  PuzzleRecordBuilder,
  puzzleRecord,
  ValidatedPuzzleBuilder,
  validatedPuzzle,
  createPuzzlePool,
} from './builders/puzzle-builder.js';

// Mocks
export { createSpyBoardEngine, type SpyBoardEngine } from './mocks/spy-board-engine.js';
