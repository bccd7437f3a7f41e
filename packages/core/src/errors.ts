/**
 * Error classes for selection constraints
 */

/**
 * Base class for errors raised by the core package
 */
export class CoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CoreError';
  }
}

/**
 * Error thrown when a selection request cannot be satisfied as stated:
 * counts, rating bounds, group ratios, theme names or list syntax.
 * Raised before any record is read.
 */
export class InvalidConstraintError extends CoreError {
  constructor(
    message: string,
    /** The offending input, as given */
    public readonly constraint: string,
  ) {
    super(message);
    this.name = 'InvalidConstraintError';
  }
}
