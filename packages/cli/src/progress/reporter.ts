/**
 * Progress reporter with ora spinners
 */

import type { PipelinePhase, ProgressCallback, PuzzleSetStats } from '@matebook/core';
import ora, { type Ora, type Color } from 'ora';

import { createColorFunctions, formatDuration, formatGroupSelection } from './formatters.js';
import {
  type RunPhase,
  type ColorFunctions,
  type ProgressReporterOptions,
  PHASE_NAMES,
} from './types.js';

export type { RunPhase, ProgressReporterOptions } from './types.js';

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime: number = 0;
  private phaseStartTime: number = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private currentPhaseName: string = '';

  // Color functions
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.c = createColorFunctions(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.c.bold(`matebook v${version}`));
    console.log('');
  }

  /**
   * Start timing the run
   */
  startRun(): void {
    this.startTime = Date.now();
  }

  /**
   * Start a new phase
   */
  startPhase(phase: RunPhase): void {
    if (this.silent) return;

    this.phaseStartTime = Date.now();
    this.currentPhaseName = PHASE_NAMES[phase];

    if (this.spinner) {
      this.spinner.stop();
    }

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: this.currentPhaseName,
      prefixText: '  ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Update phase progress. Without a total only the running count is shown.
   */
  updateProgress(current: number, total?: number): void {
    if (this.silent || !this.spinner) return;

    const progressStr = total !== undefined ? `${current}/${total}` : `${current}`;
    this.spinner.text = `${this.currentPhaseName}... ${progressStr}`;
  }

  /**
   * Complete a phase successfully
   */
  completePhase(phase: RunPhase, detail?: string): void {
    if (this.silent) return;

    const duration = Date.now() - this.phaseStartTime;
    const phaseName = PHASE_NAMES[phase];
    const durationStr = duration > 1000 ? this.c.dim(` (${formatDuration(duration)})`) : '';
    const detailStr = detail ? this.c.dim(`: ${detail}`) : '';

    if (this.spinner) {
      this.spinner.succeed(`${phaseName}${detailStr}${durationStr}`);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.green('✓')} ${phaseName}${detailStr}${durationStr}`);
    }
  }

  /**
   * Print the final summary
   */
  printSummary(stats: PuzzleSetStats): void {
    if (this.silent) return;

    const totalTime = Date.now() - this.startTime;

    console.log('');
    console.log(this.c.bold('Summary:'));
    console.log(`  Records examined: ${stats.examined}`);
    console.log(`  Verified: ${stats.accepted} (${stats.rejected} rejected)`);
    if (stats.renderFailures > 0) {
      console.log(`  Notation failures: ${stats.renderFailures}`);
    }
    console.log(`  Requested ${stats.requested}, found ${stats.selected}`);
    for (const group of stats.perGroup) {
      console.log(`    ${formatGroupSelection(group)}`);
    }
    console.log(`  Total time: ${formatDuration(totalTime)}`);
  }

  /**
   * Print output file location
   */
  printOutputLocation(outputPath: string): void {
    if (this.silent) return;
    console.log('');
    console.log(`Output written to: ${this.c.cyan(outputPath)}`);
  }

  /**
   * Print a message (respects silent setting)
   */
  printMessage(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  /**
   * Print a success message
   */
  printSuccess(message: string): void {
    if (this.silent) return;
    console.log(this.c.green(`✓ ${message}`));
  }

  /**
   * Print a warning message
   */
  printWarning(message: string): void {
    if (this.silent) return;
    console.log(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}

const PIPELINE_PHASES: Record<Exclude<PipelinePhase, 'complete'>, RunPhase> = {
  validating: 'reading',
  rendering: 'rendering',
  selecting: 'selecting',
};

/**
 * Create a progress callback for the puzzle set pipeline
 */
export function createPipelineProgressCallback(reporter: ProgressReporter): ProgressCallback {
  let currentPhase: RunPhase | null = null;

  return (phase, current, total) => {
    if (phase === 'complete') {
      if (currentPhase) {
        reporter.completePhase(currentPhase);
        currentPhase = null;
      }
      return;
    }

    const mappedPhase = PIPELINE_PHASES[phase];
    if (mappedPhase !== currentPhase) {
      if (currentPhase) {
        reporter.completePhase(currentPhase);
      }
      currentPhase = mappedPhase;
      reporter.startPhase(mappedPhase);
    }

    reporter.updateProgress(current, total);
  };
}
