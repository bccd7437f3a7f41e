export { PuzzleSetPipeline, buildPuzzleSet } from './puzzle-set-pipeline.js';
export type {
  PuzzleSetRequest,
  PuzzleSet,
  PuzzleSetStats,
  PipelineOptions,
  PipelinePhase,
  ProgressCallback,
} from './puzzle-set-pipeline.js';
