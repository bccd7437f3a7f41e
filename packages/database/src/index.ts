/**
 * @matebook/database - Puzzle corpus access for matebook
 *
 * This package provides:
 * - A streaming reader for the CSV puzzle corpus
 * - Read-time prefiltering on record fields
 */

export const VERSION = '0.1.0';

export {
  readPuzzleCorpus,
  loadPuzzleCorpus,
  matchesCorpusFilter,
  splitCsvLine,
  isHeaderRow,
  parsePuzzleRow,
  EMPTY_PUZZLE_RECORD,
  MIN_PUZZLE_FIELDS,
  type CorpusReadOptions,
  type CorpusFilter,
} from './loaders/index.js';

export { CorpusError, CorpusNotFoundError, CorpusReadError } from './errors.js';
