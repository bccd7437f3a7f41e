export {
  selectPuzzles,
  selectPuzzleGroups,
  sampleWithoutReplacement,
  allocateCounts,
  orderByRating,
  dedupePuzzles,
} from './puzzle-selector.js';
export type { GroupSelection, SelectionResult } from './puzzle-selector.js';
export { validateConstraints } from './constraints.js';
export type { SelectionConstraints, SelectionGroup } from './constraints.js';
export { createSeededRandom, randomIndex } from './random.js';
export type { RandomSource } from './random.js';
