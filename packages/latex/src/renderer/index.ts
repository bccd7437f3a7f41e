export { renderLatexDocument, puzzlePrompt, DEFAULT_PUZZLES_PER_PAGE } from './latex-renderer.js';
export type { LatexRenderOptions } from './latex-renderer.js';
export { escapeLatex, escapeNotation } from './escape.js';
