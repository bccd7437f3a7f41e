/**
 * Row parsing for the puzzle corpus
 *
 * Columns, by position:
 * PuzzleId, FEN, Moves, Rating, RatingDeviation, Popularity, NbPlays,
 * Themes, GameUrl, OpeningTags
 */

import type { PuzzleRecord } from '@matebook/types';

/** Fewest columns a row needs to describe a puzzle (through Themes) */
export const MIN_PUZZLE_FIELDS = 8;

/**
 * Record standing in for an unusable row. Validation always rejects it.
 */
export const EMPTY_PUZZLE_RECORD: PuzzleRecord = {
  id: '',
  position: '',
  moveList: [],
  rating: 0,
  tags: [],
  sourceUrl: '',
};

/**
 * Split one CSV line into fields.
 * Double-quoted fields may contain commas; `""` inside quotes is a quote.
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (inQuotes) {
      if (char === '"') {
        if (line[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      fields.push(field);
      field = '';
    } else {
      field += char;
    }
  }

  fields.push(field);
  return fields;
}

/**
 * The header row names its first column PuzzleId (any case)
 */
export function isHeaderRow(fields: readonly string[]): boolean {
  return (fields[0] ?? '').trim().toLowerCase() === 'puzzleid';
}

function splitWords(value: string | undefined): string[] {
  return (value ?? '').split(/\s+/).filter((word) => word !== '');
}

/**
 * Turn a row's fields into a record.
 *
 * A row with too few fields, or whose rating is not a plain non-negative
 * integer, becomes an empty record that keeps its id.
 */
export function parsePuzzleRow(fields: readonly string[]): PuzzleRecord {
  const id = (fields[0] ?? '').trim();
  if (fields.length < MIN_PUZZLE_FIELDS) {
    return { ...EMPTY_PUZZLE_RECORD, id };
  }

  const ratingText = (fields[3] ?? '').trim();
  if (!/^\d+$/.test(ratingText)) {
    return { ...EMPTY_PUZZLE_RECORD, id };
  }

  return {
    id,
    position: (fields[1] ?? '').trim(),
    moveList: splitWords(fields[2]),
    rating: Number(ratingText),
    tags: splitWords(fields[7]),
    sourceUrl: (fields[8] ?? '').trim(),
  };
}
