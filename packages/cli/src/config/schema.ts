/**
 * Configuration type definitions for matebook
 */

/**
 * Where puzzles come from and how much of the corpus to read
 */
export interface CorpusConfigSchema {
  /** Path to the puzzle corpus CSV */
  path: string;
  /** Records read per requested puzzle before stopping */
  oversample: number;
}

/**
 * Document output settings
 */
export interface OutputConfigSchema {
  /** Path of the LaTeX file to write */
  path: string;
  /** Diagrams per page */
  puzzlesPerPage: number;
  /** Leave puzzle ratings out of the document */
  hideRatings: boolean;
}

/**
 * Sampling settings
 */
export interface SelectionConfigSchema {
  /** Number of puzzles to select */
  count: number;
  /** Seed for reproducible sampling; null draws from Math.random */
  seed: number | null;
}

/**
 * Complete matebook configuration
 */
export interface MatebookConfig {
  corpus: CorpusConfigSchema;
  output: OutputConfigSchema;
  selection: SelectionConfigSchema;
}

/**
 * Options of the generate command after parsing
 */
export interface CliOptions {
  // Selection
  number?: number;
  mate?: number;
  mateMix?: string;
  mateUpTo?: number;
  themes?: string;
  ply?: string;
  mixRatio?: string;
  minRating?: number;
  maxRating?: number;
  progressive?: boolean;
  seed?: number;

  // Corpus
  file?: string;
  oversample?: number;

  // Document
  output?: string;
  title?: string;
  hideRatings?: boolean;
  showMateCount?: boolean;

  // Run
  config?: string;
  showConfig?: boolean;
  preview?: boolean;
  noColor?: boolean;
  quiet?: boolean;
}
