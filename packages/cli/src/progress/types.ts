/**
 * Shared types for progress reporter components
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Phases of a generate run
 */
export type RunPhase = 'reading' | 'rendering' | 'selecting' | 'writing';

/**
 * Phase display names
 */
export const PHASE_NAMES: Record<RunPhase, string> = {
  reading: 'Reading and validating puzzles',
  rendering: 'Rendering solutions',
  selecting: 'Selecting puzzles',
  writing: 'Writing document',
};

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
}
