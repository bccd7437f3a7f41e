/**
 * Error classes for corpus reading
 */

/**
 * Base error class for corpus errors
 */
export class CorpusError extends Error {
  constructor(
    message: string,
    public readonly corpusPath?: string,
  ) {
    super(message);
    this.name = 'CorpusError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CorpusError);
    }
  }
}

/**
 * Error thrown when the corpus file is not found
 */
export class CorpusNotFoundError extends CorpusError {
  constructor(corpusPath: string) {
    super(`Puzzle corpus not found: ${corpusPath}`, corpusPath);
    this.name = 'CorpusNotFoundError';
  }
}

/**
 * Error thrown when reading the corpus fails part way
 */
export class CorpusReadError extends CorpusError {
  constructor(corpusPath: string, cause?: Error) {
    super(
      `Failed to read puzzle corpus at ${corpusPath}${cause ? `: ${cause.message}` : ''}`,
      corpusPath,
    );
    this.name = 'CorpusReadError';
  }
}
