/**
 * Error Types
 *
 * Query-side failures use the built-in `TypeError` (non-text query) and
 * `RangeError` (bad result-count hint). The classes here cover the catalog
 * and the index lifecycle.
 *
 * @module errors
 */

import type { ZodError } from 'zod';

/**
 * Malformed or missing catalog structure or fields.
 * Fatal to a load; never retried.
 */
export class DataFormatError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    public readonly sourcePath?: string
  ) {
    super(message);
    this.name = 'DataFormatError';
  }

  /**
   * Build a DataFormatError from a zod validation failure.
   *
   * @param error - Zod error from a failed `safeParse`
   * @param sourcePath - Catalog file the data came from, if any
   * @param subject - What was being validated, for the message
   */
  static fromZodError(error: ZodError, sourcePath?: string, subject = 'catalog data'): DataFormatError {
    const issues = error.issues.map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    });
    const where = sourcePath ? ` in ${sourcePath}` : '';
    return new DataFormatError(
      `Invalid ${subject}${where}: ${issues.join('; ')}`,
      issues,
      sourcePath
    );
  }
}

/**
 * Index operation invoked out of order (e.g. build before load).
 */
export class IndexStateError extends Error {
  constructor(
    message: string,
    public readonly operation: string
  ) {
    super(message);
    this.name = 'IndexStateError';
  }
}

/**
 * Catalog mutation referenced a destination id that does not exist.
 */
export class DestinationNotFoundError extends Error {
  constructor(public readonly destinationId: number) {
    super(`Place with ID ${destinationId} not found`);
    this.name = 'DestinationNotFoundError';
  }
}
