import { getErrorMessage } from '@reportrag/shared';

/**
 * StoreError
 *
 * Raised for every document store failure. Names the operation and the
 * ticker or id it was applied to.
 */
export class StoreError extends Error {
  readonly operation: string;
  readonly target: string;

  constructor(
    message: string,
    operation: string,
    target: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'StoreError';
    this.operation = operation;
    this.target = target;
  }

  static fromError(operation: string, target: string, error: unknown): StoreError {
    return new StoreError(
      `Document store ${operation} failed for ${target}: ${getErrorMessage(error)}`,
      operation,
      target,
      { cause: error },
    );
  }
}
