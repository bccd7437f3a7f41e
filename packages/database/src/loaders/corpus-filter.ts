import type { PuzzleRecord } from '@matebook/types';

/**
 * Cheap prefilter applied while reading, before any board replay.
 * Only record fields are consulted.
 */
export interface CorpusFilter {
  /** Inclusive lower rating bound */
  minRating?: number;
  /** Inclusive upper rating bound */
  maxRating?: number;
  /** At least one of these tags must be present */
  anyTags?: readonly string[];
  /** All of these tags must be present */
  requiredTags?: readonly string[];
  /** Allowed solution lengths in plies (moves after the setup move) */
  plyCounts?: readonly number[];
}

export function matchesCorpusFilter(record: PuzzleRecord, filter: CorpusFilter): boolean {
  if (filter.minRating !== undefined && record.rating < filter.minRating) {
    return false;
  }
  if (filter.maxRating !== undefined && record.rating > filter.maxRating) {
    return false;
  }
  if (filter.anyTags && filter.anyTags.length > 0) {
    if (!filter.anyTags.some((tag) => record.tags.includes(tag))) {
      return false;
    }
  }
  if (filter.requiredTags && !filter.requiredTags.every((tag) => record.tags.includes(tag))) {
    return false;
  }
  if (filter.plyCounts && !filter.plyCounts.includes(record.moveList.length - 1)) {
    return false;
  }
  return true;
}
