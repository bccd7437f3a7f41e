/**
 * Correctness classes a record can be validated against
 */

/**
 * Forced mate delivered by the solver on exactly its `moves`-th move
 */
export interface MateInCriterion {
  readonly kind: 'mateIn';
  readonly moves: number;
}

/**
 * Solution length (plies after the setup move) must be one of `plies`
 */
export interface PlyCountCriterion {
  readonly kind: 'plyCount';
  readonly plies: readonly number[];
}

/**
 * Record tags must include at least one of `themes`
 */
export interface ThemeCriterion {
  readonly kind: 'theme';
  readonly themes: readonly string[];
}

/**
 * Integrity checks only
 */
export interface AnyCriterion {
  readonly kind: 'any';
}

/**
 * Accepted by the first sub-criterion that accepts, tried in order
 */
export interface OneOfCriterion {
  readonly kind: 'oneOf';
  readonly criteria: readonly Criterion[];
}

/**
 * Every sub-criterion must accept
 */
export interface AllOfCriterion {
  readonly kind: 'allOf';
  readonly criteria: readonly Criterion[];
}

export type Criterion =
  | MateInCriterion
  | PlyCountCriterion
  | ThemeCriterion
  | AnyCriterion
  | OneOfCriterion
  | AllOfCriterion;

export function mateInExactly(moves: number): MateInCriterion {
  return { kind: 'mateIn', moves };
}

export function plyCountIn(plies: Iterable<number>): PlyCountCriterion {
  return { kind: 'plyCount', plies: [...new Set(plies)] };
}

export function themeIn(themes: Iterable<string>): ThemeCriterion {
  return { kind: 'theme', themes: [...new Set(themes)] };
}

export function anyPuzzle(): AnyCriterion {
  return { kind: 'any' };
}

export function oneOf(criteria: readonly Criterion[]): OneOfCriterion {
  return { kind: 'oneOf', criteria };
}

export function allOf(criteria: readonly Criterion[]): AllOfCriterion {
  return { kind: 'allOf', criteria };
}
