import type { Criterion, ValidatedPuzzle } from '@matebook/types';

/**
 * Group membership of an already validated puzzle. No board replay.
 */
export function matchesCriterion(puzzle: ValidatedPuzzle, criterion: Criterion): boolean {
  switch (criterion.kind) {
    case 'mateIn':
      return puzzle.mateDepth === criterion.moves;
    case 'plyCount':
      return criterion.plies.includes(puzzle.plyCount);
    case 'theme':
      return criterion.themes.some((theme) => puzzle.tags.includes(theme));
    case 'any':
      return true;
    case 'oneOf':
      return criterion.criteria.some((sub) => matchesCriterion(puzzle, sub));
    case 'allOf':
      return criterion.criteria.every((sub) => matchesCriterion(puzzle, sub));
  }
}
