/**
 * MergeError
 *
 * Raised when page results cannot be merged into one document, which only
 * happens when the same page number appears more than once.
 */
export class MergeError extends Error {
  readonly pageNumber: number;

  constructor(pageNumber: number) {
    super(`Duplicate page number ${pageNumber} in page results`);
    this.name = 'MergeError';
    this.pageNumber = pageNumber;
  }
}
