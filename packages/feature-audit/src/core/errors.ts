/**
 * Feature Audit Error Types
 *
 * Raised inside a pipeline step and caught at that step's boundary, where
 * they are logged and turned into an empty or partial result.
 */

/**
 * The reference table could not be read or does not have the positional
 * columns the extractor relies on.
 */
export class ReferenceTableError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'ReferenceTableError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReferenceTableError);
    }
  }
}

/**
 * A delimited data file could not be parsed into a table
 */
export class TableLoadError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'TableLoadError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TableLoadError);
    }
  }
}
