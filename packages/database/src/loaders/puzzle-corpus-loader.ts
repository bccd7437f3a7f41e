/**
 * Puzzle Corpus Loader
 *
 * Streams puzzle records from a CSV corpus, one line at a time, so large
 * corpora are never held in memory. Unusable rows degrade to empty records
 * instead of aborting the read.
 */

import * as fs from 'fs';
import * as readline from 'readline';

import type { PuzzleRecord } from '@matebook/types';

import { CorpusError, CorpusNotFoundError, CorpusReadError } from '../errors.js';

import { matchesCorpusFilter, type CorpusFilter } from './corpus-filter.js';
import { isHeaderRow, parsePuzzleRow, splitCsvLine } from './csv-row.js';

export interface CorpusReadOptions {
  /** Prefilter applied to each parsed record */
  filter?: CorpusFilter;
  /** Stop after this many matching records */
  limit?: number;
}

/**
 * Stream records from a corpus file
 *
 * @throws CorpusNotFoundError when the file does not exist
 * @throws CorpusReadError when the stream fails
 */
export async function* readPuzzleCorpus(
  corpusPath: string,
  options: CorpusReadOptions = {},
): AsyncGenerator<PuzzleRecord, void, undefined> {
  if (!fs.existsSync(corpusPath)) {
    throw new CorpusNotFoundError(corpusPath);
  }

  const { filter, limit } = options;
  if (limit !== undefined && limit <= 0) {
    return;
  }

  const fileStream = fs.createReadStream(corpusPath, { encoding: 'utf-8' });
  const rl = readline.createInterface({
    input: fileStream,
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  let yielded = 0;

  try {
    for await (const rawLine of rl) {
      lineNumber++;
      // Strip a byte order mark on the first line
      const line = lineNumber === 1 ? rawLine.replace(/^\uFEFF/, '') : rawLine;
      if (line.trim() === '') {
        continue;
      }

      const fields = splitCsvLine(line);
      if (lineNumber === 1 && isHeaderRow(fields)) {
        continue;
      }

      const record = parsePuzzleRow(fields);
      if (filter && !matchesCorpusFilter(record, filter)) {
        continue;
      }

      yield record;
      yielded++;
      if (limit !== undefined && yielded >= limit) {
        return;
      }
    }
  } catch (error) {
    if (error instanceof CorpusError) {
      throw error;
    }
    throw new CorpusReadError(corpusPath, error instanceof Error ? error : undefined);
  } finally {
    rl.close();
    fileStream.destroy();
  }
}

/**
 * Read a whole corpus into memory
 */
export async function loadPuzzleCorpus(
  corpusPath: string,
  options: CorpusReadOptions = {},
): Promise<PuzzleRecord[]> {
  const records: PuzzleRecord[] = [];
  for await (const record of readPuzzleCorpus(corpusPath, options)) {
    records.push(record);
  }
  return records;
}
