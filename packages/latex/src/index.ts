/**
 * @matebook/latex - LaTeX rendering for matebook
 *
 * Turns a selected puzzle set into a printable document with diagrams and an
 * answer key. Compile the output with a LaTeX distribution that ships the
 * xskak and chessboard packages.
 */

export const VERSION = '0.1.0';

export {
  renderLatexDocument,
  puzzlePrompt,
  escapeLatex,
  escapeNotation,
  DEFAULT_PUZZLES_PER_PAGE,
  type LatexRenderOptions,
} from './renderer/index.js';
