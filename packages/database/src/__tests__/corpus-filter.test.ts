import { describe, it, expect } from 'vitest';

import { BACK_RANK_MATE_IN_2, SCHOLAR_MATE_IN_1 } from '@matebook/test-utils';

import { matchesCorpusFilter } from '../loaders/index.js';

describe('matchesCorpusFilter', () => {
  it('should pass everything with an empty filter', () => {
    expect(matchesCorpusFilter(SCHOLAR_MATE_IN_1, {})).toBe(true);
  });

  it('should apply inclusive rating bounds', () => {
    expect(matchesCorpusFilter(SCHOLAR_MATE_IN_1, { minRating: 900, maxRating: 900 })).toBe(true);
    expect(matchesCorpusFilter(SCHOLAR_MATE_IN_1, { minRating: 901 })).toBe(false);
    expect(matchesCorpusFilter(BACK_RANK_MATE_IN_2, { maxRating: 1399 })).toBe(false);
  });

  it('should require one of the listed tags', () => {
    expect(matchesCorpusFilter(SCHOLAR_MATE_IN_1, { anyTags: ['mateIn2', 'mateIn1'] })).toBe(true);
    expect(matchesCorpusFilter(SCHOLAR_MATE_IN_1, { anyTags: ['mateIn2'] })).toBe(false);
    expect(matchesCorpusFilter(SCHOLAR_MATE_IN_1, { anyTags: [] })).toBe(true);
  });

  it('should require every required tag', () => {
    expect(matchesCorpusFilter(BACK_RANK_MATE_IN_2, { requiredTags: ['mate', 'mateIn2'] })).toBe(
      true,
    );
    expect(matchesCorpusFilter(BACK_RANK_MATE_IN_2, { requiredTags: ['mate', 'fork'] })).toBe(
      false,
    );
  });

  it('should count plies after the setup move', () => {
    expect(matchesCorpusFilter(BACK_RANK_MATE_IN_2, { plyCounts: [3] })).toBe(true);
    expect(matchesCorpusFilter(BACK_RANK_MATE_IN_2, { plyCounts: [4] })).toBe(false);
  });
});
