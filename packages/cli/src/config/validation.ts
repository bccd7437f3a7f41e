/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { MatebookConfig } from './schema.js';

/**
 * Corpus configuration schema
 */
export const corpusConfigSchema = z.object({
  path: z.string().min(1),
  oversample: z.number().min(1).max(1000),
});

/**
 * Output configuration schema
 */
export const outputConfigSchema = z.object({
  path: z.string().min(1),
  puzzlesPerPage: z.number().int().min(1).max(16),
  hideRatings: z.boolean(),
});

/**
 * Selection configuration schema
 */
export const selectionConfigSchema = z.object({
  count: z.number().int().min(1).max(10000),
  seed: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).nullable(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  corpus: corpusConfigSchema,
  output: outputConfigSchema,
  selection: selectionConfigSchema,
});

/**
 * Partial configuration schema (for config files)
 */
export const partialConfigSchema = z.object({
  corpus: corpusConfigSchema.partial().optional(),
  output: outputConfigSchema.partial().optional(),
  selection: selectionConfigSchema.partial().optional(),
});

export type PartialMatebookConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): MatebookConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialMatebookConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
