/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, MatebookConfig } from './schema.js';
import {
  validateConfig,
  validatePartialConfig,
  type PartialMatebookConfig,
} from './validation.js';

type ConfigSection = keyof MatebookConfig;

/**
 * Configuration under construction; types are checked once all layers are merged
 */
type ConfigDraft = Record<ConfigSection, Record<string, unknown>>;

type EnvValueType = 'string' | 'number' | 'boolean';

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
const ENV_VAR_MAP: Record<string, { path: `${ConfigSection}.${string}`; type: EnvValueType }> = {
  MATEBOOK_CORPUS: { path: 'corpus.path', type: 'string' },
  MATEBOOK_OVERSAMPLE: { path: 'corpus.oversample', type: 'number' },
  MATEBOOK_OUTPUT: { path: 'output.path', type: 'string' },
  MATEBOOK_PUZZLES_PER_PAGE: { path: 'output.puzzlesPerPage', type: 'number' },
  MATEBOOK_HIDE_RATINGS: { path: 'output.hideRatings', type: 'boolean' },
  MATEBOOK_SEED: { path: 'selection.seed', type: 'number' },
};

const CONFIG_SECTIONS: readonly ConfigSection[] = ['corpus', 'output', 'selection'];

function isConfigSection(value: string): value is ConfigSection {
  return CONFIG_SECTIONS.some((section) => section === value);
}

function emptyDraft(): ConfigDraft {
  return { corpus: {}, output: {}, selection: {} };
}

/**
 * Drop keys whose value is undefined so they do not mask lower layers
 */
function definedEntries(section: object | undefined): Record<string, unknown> {
  if (!section) return {};
  return Object.fromEntries(Object.entries(section).filter(([, value]) => value !== undefined));
}

/**
 * Deep merge two configuration layers
 * Source values override target values
 */
function deepMerge(target: ConfigDraft, source: PartialMatebookConfig | ConfigDraft): ConfigDraft {
  return {
    corpus: { ...target.corpus, ...definedEntries(source.corpus) },
    output: { ...target.output, ...definedEntries(source.output) },
    selection: { ...target.selection, ...definedEntries(source.selection) },
  };
}

/**
 * Set a `section.key` property on a draft
 */
function setConfigValue(draft: ConfigDraft, path: string, value: unknown): void {
  const [section, key] = path.split('.');
  if (section === undefined || key === undefined || !isConfigSection(section)) {
    return;
  }
  draft[section][key] = value;
}

/**
 * Parse environment variable value based on expected type.
 * Unparseable numbers are passed through so validation reports them.
 */
function parseEnvValue(value: string, type: EnvValueType): unknown {
  switch (type) {
    case 'boolean':
      return value.toLowerCase() === 'true' || value === '1';
    case 'number': {
      const num = Number(value);
      return Number.isNaN(num) ? value : num;
    }
    case 'string':
      return value;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigDraft {
  const config = emptyDraft();

  for (const [envVar, { path, type }] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setConfigValue(config, path, parseEnvValue(value, type));
    }
  }

  return config;
}

/**
 * Load configuration from config file using cosmiconfig
 */
async function loadConfigFile(configPath?: string): Promise<PartialMatebookConfig | null> {
  const explorer = cosmiconfig('matebook', {
    searchPlaces: [
      'package.json',
      '.matebookrc',
      '.matebookrc.json',
      '.matebookrc.yaml',
      '.matebookrc.yml',
      'matebook.config.js',
    ],
  });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search();
  } catch (error) {
    throw new ConfigError(
      `Failed to load config file${configPath ? `: ${configPath}` : ''}`,
      error instanceof Error ? error.message : String(error),
    );
  }
  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config values
 */
function mapCliToConfig(options: CliOptions): ConfigDraft {
  const config = emptyDraft();

  if (options.file !== undefined) config.corpus['path'] = options.file;
  if (options.oversample !== undefined) config.corpus['oversample'] = options.oversample;
  if (options.output !== undefined) config.output['path'] = options.output;
  if (options.hideRatings !== undefined) config.output['hideRatings'] = options.hideRatings;
  if (options.number !== undefined) config.selection['count'] = options.number;
  if (options.seed !== undefined) config.selection['seed'] = options.seed;

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 *
 * @throws ConfigValidationError if the merged configuration is invalid
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<MatebookConfig> {
  let config = deepMerge(emptyDraft(), DEFAULT_CONFIG);

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  config = deepMerge(config, loadEnvConfig(env));
  config = deepMerge(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: MatebookConfig): string {
  return JSON.stringify(config, null, 2);
}
