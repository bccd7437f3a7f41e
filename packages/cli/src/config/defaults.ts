/**
 * Default configuration values
 */

import type {
  CorpusConfigSchema,
  MatebookConfig,
  OutputConfigSchema,
  SelectionConfigSchema,
} from './schema.js';

export const DEFAULT_CORPUS_CONFIG: CorpusConfigSchema = {
  path: 'puzzles/lichess_db_puzzle.csv',
  // Validation rejects some candidates, so read more than requested
  oversample: 3,
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  path: 'chess_puzzles.tex',
  puzzlesPerPage: 4,
  hideRatings: false,
};

export const DEFAULT_SELECTION_CONFIG: SelectionConfigSchema = {
  count: 20,
  seed: null,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: MatebookConfig = {
  corpus: DEFAULT_CORPUS_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
  selection: DEFAULT_SELECTION_CONFIG,
};
