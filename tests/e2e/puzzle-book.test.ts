/**
 * End-to-end: sample corpus → validation → selection → LaTeX document
 */

import {
  buildPuzzleSet,
  createSeededRandom,
  validatePuzzle,
  type SelectionGroup,
} from '@matebook/core';
import { loadPuzzleCorpus, readPuzzleCorpus } from '@matebook/database';
import { renderLatexDocument } from '@matebook/latex';
import { getSampleCorpusPath } from '@matebook/test-utils';
import { anyPuzzle, mateInExactly, oneOf, themeIn } from '@matebook/types';
import { describe, it, expect } from 'vitest';

const MIXED_GROUPS: SelectionGroup[] = [
  { label: 'mate', percentage: 50, criterion: oneOf([mateInExactly(1), mateInExactly(2)]) },
  { label: 'tactical', percentage: 50, criterion: themeIn(['fork', 'hangingPiece']) },
];

describe('puzzle book', () => {
  it('should build a progressive mixed book from the sample corpus', async () => {
    const records = await loadPuzzleCorpus(getSampleCorpusPath());

    const { puzzles, stats } = await buildPuzzleSet(
      records,
      { groups: MIXED_GROUPS, targetCount: 4, minRating: 500, progressive: true },
      { random: createSeededRandom(7) },
    );

    expect(puzzles.map((p) => p.id)).toEqual(['tHanging', 'm1Scholar', 'tFork', 'm2BackRank']);
    expect(stats).toEqual({
      examined: 9,
      accepted: 5,
      rejected: 4,
      renderFailures: 0,
      requested: 4,
      selected: 4,
      perGroup: [
        { label: 'mate', requested: 2, available: 2, selected: 2 },
        { label: 'tactical', requested: 2, available: 2, selected: 2 },
      ],
    });

    const document = renderLatexDocument(puzzles, {
      title: 'Mixed Chess Puzzles',
      progressive: true,
    });

    expect(document).toContain(
      'This document contains 4 puzzles, 2 checkmates and 2 tactical positions.',
    );
    expect(document).toContain('Puzzles are ordered from easiest to hardest.');
    expect(document).toContain('\\textbf{Puzzle 1:} Rxa2');
    expect(document).toContain('\\textbf{Puzzle 2:} Qxf7\\#');
    expect(document).toContain('\\textbf{Puzzle 3:} Ne7+, Kf7, Nxc8');
    expect(document).toContain('\\textbf{Puzzle 4:} Re8+, Rxe8, Rxe8\\#');
    expect(document).toContain('\\textbf{White to move: find the best line (1 move)}');
  });

  it('should stream a prefiltered corpus into a mate-in-2 book', async () => {
    const records = readPuzzleCorpus(getSampleCorpusPath(), {
      filter: { anyTags: ['mateIn2'], requiredTags: ['mate'] },
      limit: 10,
    });

    const { puzzles, stats } = await buildPuzzleSet(records, {
      groups: [{ label: 'mate', percentage: 100, criterion: mateInExactly(2) }],
      targetCount: 5,
    });

    expect(puzzles.map((p) => p.id)).toEqual(['m2BackRank']);
    expect(puzzles[0]?.mateDepth).toBe(2);
    expect(stats.examined).toBe(2);
    expect(stats.perGroup).toEqual([{ label: 'mate', requested: 5, available: 1, selected: 1 }]);

    const document = renderLatexDocument(puzzles, { title: 'Mate-in-2 Chess Puzzles' });
    expect(document).toContain('This document contains 1 mate-in-2 puzzle.');
    expect(document).toContain('\\textbf{White to move and checkmate in 2}');
    expect(document.endsWith('\\end{document}\n')).toBe(true);
  });

  it('should reject a corpus row whose rating cannot be read', async () => {
    const records = await loadPuzzleCorpus(getSampleCorpusPath());
    const unrated = records.find((r) => r.id === 'xRating');

    expect(unrated).toBeDefined();
    if (unrated) {
      expect(validatePuzzle(unrated, anyPuzzle())).toBeNull();
      expect(validatePuzzle(unrated, themeIn(['hangingPiece']))).toBeNull();
    }
  });
});
