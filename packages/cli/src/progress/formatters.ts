/**
 * Output formatting utilities
 */

import type { GroupSelection } from '@matebook/core';
import chalk from 'chalk';

import type { MatebookConfig } from '../config/schema.js';

import type { ColorFunctions } from './types.js';

/**
 * Color functions backed by chalk, or plain text when color is off
 */
export function createColorFunctions(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  // No colors - return text as-is
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Format configuration for display
 */
export function formatConfigDisplay(
  config: MatebookConfig,
  c: ColorFunctions = createColorFunctions(true),
): string {
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  lines.push(c.dim('Corpus:'));
  lines.push(`  Path: ${config.corpus.path}`);
  lines.push(`  Oversample: ${config.corpus.oversample}`);
  lines.push('');

  lines.push(c.dim('Selection:'));
  lines.push(`  Count: ${config.selection.count}`);
  lines.push(`  Seed: ${config.selection.seed ?? 'random'}`);
  lines.push('');

  lines.push(c.dim('Output:'));
  lines.push(`  Path: ${config.output.path}`);
  lines.push(`  Puzzles per page: ${config.output.puzzlesPerPage}`);
  if (config.output.hideRatings) {
    lines.push(`  Hide ratings: ${c.yellow('yes')}`);
  }

  return lines.join('\n');
}

/**
 * One line of the per-group summary, e.g. "mate: 7 of 7 (12 available)"
 */
export function formatGroupSelection(group: GroupSelection): string {
  return `${group.label}: ${group.selected} of ${group.requested} (${group.available} available)`;
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}
