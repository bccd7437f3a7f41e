export { validatePuzzle } from './puzzle-validator.js';
export { matchesCriterion } from './criterion-matcher.js';
