/**
 * @matebook/types - Shared type definitions for matebook
 *
 * This package provides a stable import location for the puzzle data model
 * used across the validator, the selection engine, the corpus reader and the
 * document renderer.
 *
 * Usage:
 *   import type { PuzzleRecord, ValidatedPuzzle, Criterion } from '@matebook/types';
 */

export type { Side, PuzzleRecord, ValidatedPuzzle } from './puzzle/index.js';
export { sideLabel, puzzleKey, solverMoveCount } from './puzzle/index.js';

export type {
  Criterion,
  MateInCriterion,
  PlyCountCriterion,
  ThemeCriterion,
  AnyCriterion,
  OneOfCriterion,
  AllOfCriterion,
} from './criterion/index.js';
export {
  mateInExactly,
  plyCountIn,
  themeIn,
  anyPuzzle,
  oneOf,
  allOf,
} from './criterion/index.js';
