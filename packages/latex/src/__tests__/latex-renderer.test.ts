import { describe, it, expect } from 'vitest';

import { createPuzzlePool, validatedPuzzle } from '@matebook/test-utils';

import { escapeLatex, escapeNotation, puzzlePrompt, renderLatexDocument } from '../index.js';

const mateInTwo = validatedPuzzle()
  .withId('m2BackRank')
  .withRating(1400)
  .withSolverSide('first')
  .withPresentedPosition('r5k1/5ppp/8/8/8/8/4RPPP/4R1K1 w - - 1 2')
  .withSolution(['e2e8', 'a8e8', 'e1e8'], ['Re8+', 'Rxe8', 'Rxe8#'])
  .asMateIn(2)
  .build();

const mateInOne = validatedPuzzle()
  .withId('m1_scholar')
  .withRating(900)
  .withSolution(['h5f7'], ['Qxf7#'])
  .asMateIn(1)
  .build();

const fork = validatedPuzzle()
  .withId('tFork')
  .withSolverSide('second')
  .withSolution(['d5e7', 'g8f7', 'e7c8'], ['Ne7+', 'Kf7', 'Nxc8'])
  .build();

function linesOf(document: string): string[] {
  return document.split('\n');
}

describe('escapeLatex', () => {
  it('should escape every special character', () => {
    expect(escapeLatex('# $ % & _ { } ~ ^ \\')).toBe(
      '\\# \\$ \\% \\& \\_ \\{ \\} \\textasciitilde{} \\textasciicircum{} \\textbackslash{}',
    );
  });

  it('should leave plain text alone', () => {
    expect(escapeLatex('Mate-in-2 Chess Puzzles')).toBe('Mate-in-2 Chess Puzzles');
  });
});

describe('escapeNotation', () => {
  it('should escape the mate marker', () => {
    expect(escapeNotation('Rxe8#')).toBe('Rxe8\\#');
    expect(escapeNotation('Re8+')).toBe('Re8+');
  });
});

describe('puzzlePrompt', () => {
  it('should announce the mate length', () => {
    expect(puzzlePrompt(mateInTwo)).toBe('White to move and checkmate in 2');
    expect(puzzlePrompt(mateInTwo, false)).toBe('White to move and checkmate');
  });

  it('should count solver moves for non-mate puzzles', () => {
    expect(puzzlePrompt(fork)).toBe('Black to move: find the best line (2 moves)');
    expect(
      puzzlePrompt(validatedPuzzle().withSolverSide('first').withSolution(['a1a2']).build()),
    ).toBe('White to move: find the best line (1 move)');
  });
});

describe('renderLatexDocument', () => {
  it('should wrap the set in a complete article', () => {
    const lines = linesOf(renderLatexDocument([mateInTwo], { title: 'Mate-in-2 Chess Puzzles' }));

    expect(lines[0]).toBe('\\documentclass[12pt,a4paper]{article}');
    expect(lines).toContain('\\usepackage{xskak}');
    expect(lines).toContain('\\usepackage{chessboard}');
    expect(lines).toContain('\\title{Mate-in-2 Chess Puzzles}');
    expect(lines).toContain('\\fancyhead[L]{\\slshape Mate-in-2 Chess Puzzles}');
    expect(lines).toContain('\\begin{document}');
    expect(lines.at(-2)).toBe('\\end{document}');
    expect(lines.at(-1)).toBe('');
  });

  it('should render a diagram section per puzzle', () => {
    const lines = linesOf(renderLatexDocument([mateInTwo]));
    const start = lines.indexOf('\\subsection*{Puzzle 1}');

    expect(lines.slice(start, start + 11)).toEqual([
      '\\subsection*{Puzzle 1}',
      '\\begin{center}',
      '\\newgame',
      '\\fenboard{r5k1/5ppp/8/8/8/8/4RPPP/4R1K1 w - - 1 2}',
      '\\chessboard',
      '\\end{center}',
      '\\begin{center}',
      '\\textbf{White to move and checkmate in 2}',
      '',
      '\\small{Puzzle ID: m2BackRank} \\quad Rating: 1400',
      '\\end{center}',
    ]);
  });

  it('should escape ids and omit ratings on request', () => {
    const lines = linesOf(renderLatexDocument([mateInOne], { showRatings: false }));
    expect(lines).toContain('\\small{Puzzle ID: m1\\_scholar}');
  });

  it('should list escaped solutions in the answer key', () => {
    const lines = linesOf(renderLatexDocument([mateInTwo, mateInOne]));
    const start = lines.indexOf('\\section*{Solutions}');

    expect(lines.slice(start, start + 5)).toEqual([
      '\\section*{Solutions}',
      '',
      '\\textbf{Puzzle 1:} Re8+, Rxe8, Rxe8\\#',
      '',
      '\\textbf{Puzzle 2:} Qxf7\\#',
    ]);
  });

  it('should use a custom solution separator', () => {
    const document = renderLatexDocument([mateInTwo], { solutionSeparator: ' ; ' });
    expect(linesOf(document)).toContain('\\textbf{Puzzle 1:} Re8+ ; Rxe8 ; Rxe8\\#');
  });

  it('should break pages after every full page of puzzles', () => {
    const pool = createPuzzlePool(9, 'p', (b) => b.withSolution(['a1a2'], ['Ra2']));
    const lines = linesOf(renderLatexDocument(pool));
    const puzzles = lines.slice(
      lines.indexOf('\\section*{Puzzles}'),
      lines.indexOf('\\section*{Solutions}'),
    );

    // Two breaks inside the puzzles, one before the answer key
    expect(puzzles.filter((line) => line === '\\newpage')).toHaveLength(3);
    expect(puzzles[puzzles.indexOf('\\subsection*{Puzzle 5}') - 1]).toBe('\\newpage');
    expect(puzzles[puzzles.indexOf('\\subsection*{Puzzle 9}') - 1]).toBe('\\newpage');
  });

  it('should not break after the last puzzle when the page is full', () => {
    const pool = createPuzzlePool(4, 'p', (b) => b.withSolution(['a1a2'], ['Ra2']));
    const lines = linesOf(renderLatexDocument(pool, { puzzlesPerPage: 2 }));
    const puzzles = lines.slice(
      lines.indexOf('\\section*{Puzzles}'),
      lines.indexOf('\\section*{Solutions}'),
    );

    expect(puzzles.filter((line) => line === '\\newpage')).toHaveLength(2);
  });

  describe('instructions', () => {
    function instructions(document: string): string[] {
      const lines = linesOf(document);
      const start = lines.indexOf('\\section*{Instructions}') + 1;
      return lines.slice(start, lines.indexOf('', start));
    }

    it('should describe a uniform mate set', () => {
      expect(instructions(renderLatexDocument([mateInTwo, mateInTwo]))).toEqual([
        'This document contains 2 mate-in-2 puzzles.',
        'For each puzzle, find the sequence of moves that leads to checkmate in 2 moves.',
        'Solutions are provided on the last page.',
      ]);
    });

    it('should hide the count for mixed mate depths', () => {
      const document = renderLatexDocument([mateInTwo, mateInOne], { progressive: true });
      expect(instructions(document)).toEqual([
        'This document contains 2 checkmate puzzles.',
        'For each puzzle, find the sequence of moves that leads to checkmate.',
        'Puzzles are ordered from easiest to hardest.',
        'Solutions are provided on the last page.',
      ]);
      expect(linesOf(document)).toContain('\\textbf{White to move and checkmate}');
    });

    it('should describe tactical and mixed sets', () => {
      expect(instructions(renderLatexDocument([fork]))[0]).toBe(
        'This document contains 1 tactical puzzle.',
      );
      expect(instructions(renderLatexDocument([mateInOne, fork]))[0]).toBe(
        'This document contains 2 puzzles, 1 checkmate and 1 tactical position.',
      );
    });

    it('should show the mate count when asked even for mixed depths', () => {
      const document = renderLatexDocument([mateInTwo, mateInOne], { showMateCount: true });
      expect(linesOf(document)).toContain('\\textbf{Black to move and checkmate in 1}');
    });
  });
});
