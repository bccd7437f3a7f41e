/**
 * Configuration module exports
 */

// Schema types
export type {
  CorpusConfigSchema,
  OutputConfigSchema,
  SelectionConfigSchema,
  MatebookConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_CORPUS_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_SELECTION_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
  type PartialMatebookConfig,
} from './validation.js';

// Loader
export { loadConfig, loadEnvConfig, formatConfig } from './loader.js';
