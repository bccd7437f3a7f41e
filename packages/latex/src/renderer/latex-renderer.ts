/**
 * LaTeX puzzle book renderer
 *
 * Produces a standalone article: title page, instructions, one diagram per
 * puzzle (xskak/chessboard) and an answer key.
 */

import { sideLabel, solverMoveCount, type ValidatedPuzzle } from '@matebook/types';

import { escapeLatex, escapeNotation } from './escape.js';

/**
 * Default number of diagrams per page
 */
export const DEFAULT_PUZZLES_PER_PAGE = 4;

/**
 * Options for LaTeX rendering
 */
export interface LatexRenderOptions {
  /** Document title (default: "Chess Puzzles") */
  title?: string;
  /** Print each puzzle's rating (default: true) */
  showRatings?: boolean;
  /**
   * State the mate length in prompts (default: true unless the set mixes
   * several mate depths)
   */
  showMateCount?: boolean;
  /** Say in the instructions that puzzles get harder (default: false) */
  progressive?: boolean;
  /** Diagrams per page before a page break (default: 4) */
  puzzlesPerPage?: number;
  /** Joins solution moves in the answer key (default: ", ") */
  solutionSeparator?: string;
}

interface ResolvedOptions {
  title: string;
  showRatings: boolean;
  showMateCount: boolean;
  progressive: boolean;
  puzzlesPerPage: number;
  solutionSeparator: string;
}

function mateDepths(puzzles: readonly ValidatedPuzzle[]): Set<number> {
  const depths = new Set<number>();
  for (const puzzle of puzzles) {
    if (puzzle.mateDepth !== undefined) {
      depths.add(puzzle.mateDepth);
    }
  }
  return depths;
}

function resolveOptions(
  puzzles: readonly ValidatedPuzzle[],
  options: LatexRenderOptions,
): ResolvedOptions {
  const puzzlesPerPage = options.puzzlesPerPage ?? DEFAULT_PUZZLES_PER_PAGE;
  return {
    title: options.title ?? 'Chess Puzzles',
    showRatings: options.showRatings ?? true,
    showMateCount: options.showMateCount ?? mateDepths(puzzles).size <= 1,
    progressive: options.progressive ?? false,
    puzzlesPerPage: Math.max(1, Math.floor(puzzlesPerPage)),
    solutionSeparator: options.solutionSeparator ?? ', ',
  };
}

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

/**
 * Instruction paragraph describing what the set contains
 */
function renderInstructions(
  puzzles: readonly ValidatedPuzzle[],
  options: ResolvedOptions,
): string[] {
  const mates = puzzles.filter((puzzle) => puzzle.mateDepth !== undefined).length;
  const depths = [...mateDepths(puzzles)];
  const [onlyDepth] = depths;
  const lines: string[] = [];

  if (puzzles.length > 0 && mates === puzzles.length) {
    if (options.showMateCount && depths.length === 1 && onlyDepth !== undefined) {
      lines.push(
        `This document contains ${plural(puzzles.length, `mate-in-${onlyDepth} puzzle`)}.`,
        `For each puzzle, find the sequence of moves that leads to checkmate in ${plural(onlyDepth, 'move')}.`,
      );
    } else {
      lines.push(
        `This document contains ${plural(puzzles.length, 'checkmate puzzle')}.`,
        'For each puzzle, find the sequence of moves that leads to checkmate.',
      );
    }
  } else if (mates === 0) {
    lines.push(
      `This document contains ${plural(puzzles.length, 'tactical puzzle')}.`,
      'For each puzzle, find the best line for the side to move.',
    );
  } else {
    lines.push(
      `This document contains ${plural(puzzles.length, 'puzzle')}, ${plural(mates, 'checkmate')} and ${plural(puzzles.length - mates, 'tactical position')}.`,
      'For each puzzle, find the checkmate where one is announced, otherwise the best line.',
    );
  }

  if (options.progressive) {
    lines.push('Puzzles are ordered from easiest to hardest.');
  }
  lines.push('Solutions are provided on the last page.');
  return lines;
}

/**
 * The task printed under a diagram
 */
export function puzzlePrompt(puzzle: ValidatedPuzzle, showMateCount = true): string {
  const side = sideLabel(puzzle.solverSide);
  if (puzzle.mateDepth !== undefined) {
    return showMateCount
      ? `${side} to move and checkmate in ${puzzle.mateDepth}`
      : `${side} to move and checkmate`;
  }
  return `${side} to move: find the best line (${plural(solverMoveCount(puzzle.plyCount), 'move')})`;
}

function renderPuzzle(
  puzzle: ValidatedPuzzle,
  number: number,
  options: ResolvedOptions,
): string[] {
  const idLine = `\\small{Puzzle ID: ${escapeLatex(puzzle.id)}}`;
  return [
    `\\subsection*{Puzzle ${number}}`,
    '\\begin{center}',
    '\\newgame',
    `\\fenboard{${puzzle.presentedPosition}}`,
    '\\chessboard',
    '\\end{center}',
    '\\begin{center}',
    `\\textbf{${escapeLatex(puzzlePrompt(puzzle, options.showMateCount))}}`,
    '',
    options.showRatings ? `${idLine} \\quad Rating: ${puzzle.rating}` : idLine,
    '\\end{center}',
    '',
    '\\vspace{1cm}',
    '',
  ];
}

/**
 * Render a puzzle set as a LaTeX document
 *
 * @param puzzles - Puzzles in presentation order, with notation rendered
 * @returns Complete document source
 */
export function renderLatexDocument(
  puzzles: readonly ValidatedPuzzle[],
  options: LatexRenderOptions = {},
): string {
  const resolved = resolveOptions(puzzles, options);
  const title = escapeLatex(resolved.title);

  const lines: string[] = [
    '\\documentclass[12pt,a4paper]{article}',
    '\\usepackage[utf8]{inputenc}',
    '\\usepackage{xskak}',
    '\\usepackage{chessboard}',
    '\\usepackage{geometry}',
    '\\usepackage{multicol}',
    '\\usepackage{titlesec}',
    '\\usepackage{fancyhdr}',
    '\\usepackage{lastpage}',
    '\\usepackage{enumitem}',
    '',
    '\\geometry{margin=1in}',
    '\\setlength{\\parindent}{0pt}',
    '\\setlength{\\parskip}{6pt}',
    '',
    '\\pagestyle{fancy}',
    '\\fancyhf{}',
    `\\fancyhead[L]{\\slshape ${title}}`,
    '\\fancyhead[R]{\\slshape Page \\thepage\\ of \\pageref{LastPage}}',
    '\\renewcommand{\\headrulewidth}{0.4pt}',
    '\\renewcommand{\\footrulewidth}{0.4pt}',
    '',
    `\\title{${title}}`,
    '\\author{}',
    '\\date{\\today}',
    '',
    '\\begin{document}',
    '',
    '\\maketitle',
    '',
    '\\section*{Instructions}',
    ...renderInstructions(puzzles, resolved),
    '',
    '\\newpage',
    '\\section*{Puzzles}',
    '',
  ];

  puzzles.forEach((puzzle, index) => {
    const number = index + 1;
    lines.push(...renderPuzzle(puzzle, number, resolved));
    if (number % resolved.puzzlesPerPage === 0 && number < puzzles.length) {
      lines.push('\\newpage');
    }
  });

  lines.push('\\newpage', '\\section*{Solutions}', '');

  const separator = escapeLatex(resolved.solutionSeparator);
  puzzles.forEach((puzzle, index) => {
    const solution = puzzle.solutionNotation.map(escapeNotation).join(separator);
    lines.push(`\\textbf{Puzzle ${index + 1}:} ${solution}`, '');
  });

  lines.push('\\end{document}');
  return `${lines.join('\n')}\n`;
}
