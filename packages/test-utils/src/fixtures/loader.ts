/**
 * Fixture loading utilities for tests
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Root of the corpus fixtures, from src or dist
 */
function getFixturesRoot(): string {
  if (__dirname.includes(`${path.sep}dist${path.sep}`)) {
    const packageRoot = path.resolve(__dirname, '..', '..');
    return path.join(packageRoot, 'src', 'fixtures', 'corpus');
  }
  return path.join(__dirname, 'corpus');
}

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(relativePath: string): string {
  return path.join(getFixturesRoot(), relativePath);
}

/**
 * Path of the sample puzzle corpus (CSV with a header, a blank line, a short
 * row, a quoted field, a duplicate and a non-numeric rating)
 */
export function getSampleCorpusPath(): string {
  return getFixturePath('puzzles.csv');
}
