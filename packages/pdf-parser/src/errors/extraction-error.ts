import { getErrorMessage } from '@reportrag/shared';

/**
 * ExtractionError
 *
 * Raised when a PDF cannot be opened or its text layer cannot be read.
 * Extraction is all-or-nothing, so this is fatal for the run.
 */
export class ExtractionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExtractionError';
  }

  static fromError(context: string, error: unknown): ExtractionError {
    return new ExtractionError(`${context}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
}
