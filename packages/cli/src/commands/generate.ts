/**
 * Generate command implementation
 */

import * as fs from 'node:fs';

import { describePosition } from '@matebook/board';
import { buildPuzzleSet, createSeededRandom, type PuzzleSet } from '@matebook/core';
import { CorpusNotFoundError, readPuzzleCorpus } from '@matebook/database';
import { renderLatexDocument, type LatexRenderOptions } from '@matebook/latex';
import type { ValidatedPuzzle } from '@matebook/types';

import { parseCliOptions, VERSION } from '../cli.js';
import { loadConfig, formatConfig, type MatebookConfig } from '../config/index.js';
import { InputError, OutputError, handleError, resolveAbsolutePath } from '../errors/index.js';
import { buildSelectionPlan, type SelectionPlan } from '../plan/selection-plan.js';
import {
  ProgressReporter,
  createColorFunctions,
  createPipelineProgressCallback,
  formatConfigDisplay,
} from '../progress/index.js';

/**
 * Write the document, replacing any existing file
 */
function writeOutput(output: string, outputPath: string): void {
  try {
    fs.writeFileSync(outputPath, output, 'utf-8');
  } catch (error) {
    throw new OutputError(
      `Failed to write output file: ${outputPath}`,
      error instanceof Error ? error.message : 'unknown error',
    );
  }
}

/**
 * LaTeX options for a plan and configuration
 */
export function latexOptionsFor(plan: SelectionPlan, config: MatebookConfig): LatexRenderOptions {
  const options: LatexRenderOptions = {
    title: plan.title,
    showRatings: !config.output.hideRatings,
    progressive: plan.request.progressive ?? false,
    puzzlesPerPage: config.output.puzzlesPerPage,
  };
  if (plan.showMateCount !== undefined) {
    options.showMateCount = plan.showMateCount;
  }
  return options;
}

/**
 * Text preview of one puzzle for the terminal
 */
export function formatPuzzlePreview(puzzle: ValidatedPuzzle, index: number): string {
  return [
    `Puzzle ${index + 1}: ${puzzle.id} (rating ${puzzle.rating})`,
    describePosition(puzzle.presentedPosition),
    `Solution: ${puzzle.solutionNotation.join(' ')}`,
  ].join('\n');
}

async function selectFromCorpus(
  corpusPath: string,
  plan: SelectionPlan,
  config: MatebookConfig,
  reporter: ProgressReporter,
): Promise<PuzzleSet> {
  const records = readPuzzleCorpus(corpusPath, {
    filter: plan.corpusFilter,
    limit: plan.readLimit,
  });
  const seed = config.selection.seed;

  try {
    return await buildPuzzleSet(records, plan.request, {
      random: seed !== null ? createSeededRandom(seed) : Math.random,
      onProgress: createPipelineProgressCallback(reporter),
    });
  } catch (error) {
    if (error instanceof CorpusNotFoundError) {
      throw new InputError(
        error.message,
        'Pass the corpus CSV with --file or set MATEBOOK_CORPUS',
      );
    }
    throw error;
  }
}

/**
 * Main generate command handler
 */
export async function generateCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new ProgressReporter({
    color: !options.noColor,
    silent: options.quiet ?? false,
  });

  try {
    const config = await loadConfig(options);

    // Show config and exit if requested
    if (options.showConfig) {
      console.log(formatConfigDisplay(config, createColorFunctions(!options.noColor)));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    // Option errors surface before the corpus is opened
    const plan = buildSelectionPlan(options, config);
    const corpusPath = resolveAbsolutePath(config.corpus.path);

    reporter.printHeader(VERSION);
    reporter.printMessage(
      `Selecting ${config.selection.count} ${plan.description} from ${corpusPath}`,
    );
    reporter.printMessage('');

    reporter.startRun();
    const puzzleSet = await selectFromCorpus(corpusPath, plan, config, reporter);

    reporter.startPhase('writing');
    const document = renderLatexDocument(puzzleSet.puzzles, latexOptionsFor(plan, config));
    writeOutput(document, config.output.path);
    reporter.completePhase('writing', `${puzzleSet.puzzles.length} puzzles`);

    reporter.printSummary(puzzleSet.stats);
    const { requested, selected } = puzzleSet.stats;
    if (selected < requested) {
      reporter.printWarning(
        `Only found ${selected} ${plan.description}, fewer than the requested ${requested}`,
      );
    }

    if (options.preview) {
      for (const [index, puzzle] of puzzleSet.puzzles.entries()) {
        reporter.printMessage('');
        reporter.printMessage(formatPuzzlePreview(puzzle, index));
      }
    }

    reporter.printOutputLocation(config.output.path);
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
