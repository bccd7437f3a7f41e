export { readPuzzleCorpus, loadPuzzleCorpus } from './puzzle-corpus-loader.js';
export type { CorpusReadOptions } from './puzzle-corpus-loader.js';
export { matchesCorpusFilter } from './corpus-filter.js';
export type { CorpusFilter } from './corpus-filter.js';
export {
  splitCsvLine,
  isHeaderRow,
  parsePuzzleRow,
  EMPTY_PUZZLE_RECORD,
  MIN_PUZZLE_FIELDS,
} from './csv-row.js';
