/**
 * Configuration system tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { loadConfig, loadEnvConfig } from '../config/loader.js';
import {
  validateConfig,
  validatePartialConfig,
  ConfigValidationError,
} from '../config/validation.js';
import { ConfigError } from '../errors/cli-errors.js';

describe('Config Defaults', () => {
  it('should have valid default values', () => {
    expect(DEFAULT_CONFIG.corpus).toEqual({
      path: 'puzzles/lichess_db_puzzle.csv',
      oversample: 3,
    });
    expect(DEFAULT_CONFIG.output).toEqual({
      path: 'chess_puzzles.tex',
      puzzlesPerPage: 4,
      hideRatings: false,
    });
    expect(DEFAULT_CONFIG.selection).toEqual({ count: 20, seed: null });
  });

  it('should pass its own validation', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
  });
});

describe('Config Validation', () => {
  it('should reject a zero oversample factor', () => {
    const config = { ...DEFAULT_CONFIG, corpus: { ...DEFAULT_CONFIG.corpus, oversample: 0 } };
    expect(() => validateConfig(config)).toThrow(ConfigValidationError);
  });

  it('should report the path of every invalid value', () => {
    const config = {
      ...DEFAULT_CONFIG,
      output: { ...DEFAULT_CONFIG.output, puzzlesPerPage: 0 },
      selection: { count: 2.5, seed: -1 },
    };
    try {
      validateConfig(config);
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.errors.map((e) => e.path)).toEqual([
          'output.puzzlesPerPage',
          'selection.count',
          'selection.seed',
        ]);
      }
    }
  });

  it('should format errors with hints', () => {
    const error = new ConfigValidationError([{ path: 'corpus.path', message: 'Required' }]);
    expect(error.format()).toBe(
      [
        'Configuration validation failed:',
        '',
        '  corpus.path: Required',
        '',
        'Use --help to see available options',
        'Use --show-config to see current configuration',
      ].join('\n'),
    );
  });

  it('should accept partial config files', () => {
    expect(validatePartialConfig({ output: { hideRatings: true } })).toEqual({
      output: { hideRatings: true },
    });
  });

  it('should reject wrongly typed partial values', () => {
    expect(() => validatePartialConfig({ selection: { seed: 'abc' } })).toThrow(
      ConfigValidationError,
    );
  });
});

describe('loadEnvConfig', () => {
  it('should map environment variables to config paths', () => {
    const config = loadEnvConfig({
      MATEBOOK_CORPUS: '/data/puzzles.csv',
      MATEBOOK_OVERSAMPLE: '5',
      MATEBOOK_HIDE_RATINGS: 'true',
      MATEBOOK_SEED: '42',
    });
    expect(config).toEqual({
      corpus: { path: '/data/puzzles.csv', oversample: 5 },
      output: { hideRatings: true },
      selection: { seed: 42 },
    });
  });

  it('should ignore empty and unrelated variables', () => {
    expect(loadEnvConfig({ MATEBOOK_OUTPUT: '', HOME: '/home/test' })).toEqual({
      corpus: {},
      output: {},
      selection: {},
    });
  });

  it('should pass unparseable numbers through for validation', () => {
    expect(loadEnvConfig({ MATEBOOK_PUZZLES_PER_PAGE: 'many' }).output).toEqual({
      puzzlesPerPage: 'many',
    });
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'matebook-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfigFile(content: unknown): string {
    const file = path.join(tempDir, '.matebookrc.json');
    fs.writeFileSync(file, JSON.stringify(content));
    return file;
  }

  it('should layer file, environment and CLI values over the defaults', async () => {
    const config = writeConfigFile({
      corpus: { path: 'from-file.csv', oversample: 4 },
      output: { puzzlesPerPage: 6 },
      selection: { count: 10 },
    });

    const result = await loadConfig(
      { config, output: 'cli.tex', number: 8 },
      { MATEBOOK_CORPUS: 'from-env.csv', MATEBOOK_PUZZLES_PER_PAGE: '2' },
    );

    expect(result).toEqual({
      corpus: { path: 'from-env.csv', oversample: 4 },
      output: { path: 'cli.tex', puzzlesPerPage: 2, hideRatings: false },
      selection: { count: 8, seed: null },
    });
  });

  it('should reject an invalid merged configuration', async () => {
    const config = writeConfigFile({});
    await expect(
      loadConfig({ config }, { MATEBOOK_PUZZLES_PER_PAGE: 'many' }),
    ).rejects.toBeInstanceOf(ConfigValidationError);
  });

  it('should reject an invalid config file', async () => {
    const config = writeConfigFile({ output: { hideRatings: 'sometimes' } });
    await expect(loadConfig({ config }, {})).rejects.toBeInstanceOf(ConfigValidationError);
  });

  it('should report a missing config file', async () => {
    const missing = path.join(tempDir, 'missing.json');
    await expect(loadConfig({ config: missing }, {})).rejects.toBeInstanceOf(ConfigError);
  });
});
