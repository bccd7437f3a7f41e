/**
 * @matebook/core - Puzzle validation and selection for matebook
 *
 * This package contains:
 * - The puzzle validator (mate-in-N replay, ply and theme profiles)
 * - The selection engine (rating filter, deduplication, ratio sampling)
 * - The tactical theme catalogue and constraint parsing
 * - The validate, render and select pipeline
 */

export const VERSION = '0.1.0';

export { CoreError, InvalidConstraintError } from './errors.js';

export * from './validator/index.js';
export * from './selection/index.js';
export * from './themes/index.js';
export * from './pipeline/index.js';
