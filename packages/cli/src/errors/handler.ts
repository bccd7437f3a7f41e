/**
 * Error handling utilities
 */

import { InvalidConstraintError } from '@matebook/core';
import { CorpusError } from '@matebook/database';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError } from './cli-errors.js';

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Exit code for an error: 2 for bad options or configuration, 3 for corpus
 * problems, 1 otherwise
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof ConfigValidationError || error instanceof InvalidConstraintError) {
    return 2;
  }
  if (error instanceof CorpusError) {
    return 3;
  }
  return 1;
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));
  process.exit(exitCodeFor(error));
}
