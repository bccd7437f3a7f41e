/**
 * Progress module exports
 */

export type { RunPhase, ProgressReporterOptions } from './reporter.js';
export { ProgressReporter, createPipelineProgressCallback } from './reporter.js';
export {
  createColorFunctions,
  formatConfigDisplay,
  formatDuration,
  formatGroupSelection,
} from './formatters.js';
