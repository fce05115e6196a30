import { getErrorMessage } from '@reportrag/shared';

/**
 * VectorStoreError
 *
 * Raised when embedding, indexing or searching chunks fails.
 */
export class VectorStoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'VectorStoreError';
  }

  static fromError(context: string, error: unknown): VectorStoreError {
    if (error instanceof VectorStoreError) {
      return error;
    }
    return new VectorStoreError(`${context}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
}
