export type EmbeddingPreconditionReason =
  | 'not_found'
  | 'incomplete'
  | 'empty_content';

/**
 * EmbeddingPreconditionError
 *
 * A stored document cannot be embedded in its current state. Carried inside
 * a failed embedding result rather than thrown.
 */
export class EmbeddingPreconditionError extends Error {
  readonly ticker: string;
  readonly reason: EmbeddingPreconditionReason;

  constructor(ticker: string, reason: EmbeddingPreconditionReason, message: string) {
    super(message);
    this.name = 'EmbeddingPreconditionError';
    this.ticker = ticker;
    this.reason = reason;
  }
}
