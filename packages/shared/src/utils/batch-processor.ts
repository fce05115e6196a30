/**
 * BatchProcessor - Batch processing utility
 *
 * Splits large arrays into fixed-size batches for APIs that cap the number of
 * inputs per request.
 */
export class BatchProcessor {
  /**
   * Splits an array into batches of specified size.
   *
   * @example
   * ```typescript
   * const batches = BatchProcessor.createBatches([1, 2, 3, 4, 5], 2);
   * // [[1, 2], [3, 4], [5]]
   * ```
   */
  static createBatches<T>(items: T[], batchSize: number): T[][] {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(
        `Batch size must be a positive integer, got ${batchSize}`,
      );
    }

    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += batchSize) {
      batches.push(items.slice(i, i + batchSize));
    }
    return batches;
  }

  /**
   * Splits an array into batches and processes them one after another.
   *
   * Each batch must return one result per input item; results are flattened
   * in input order. A failing batch stops the run.
   *
   * @example
   * ```typescript
   * const vectors = await BatchProcessor.processSequential(
   *   texts,
   *   100,
   *   async (batch) => embedder.embedMany(batch),
   * );
   * ```
   */
  static async processSequential<T, R>(
    items: T[],
    batchSize: number,
    processFn: (batch: T[], batchIndex: number) => Promise<R[]>,
  ): Promise<R[]> {
    const batches = this.createBatches(items, batchSize);
    const results: R[] = [];

    for (const [batchIndex, batch] of batches.entries()) {
      const batchResults = await processFn(batch, batchIndex);
      if (batchResults.length !== batch.length) {
        throw new Error(
          `Batch ${batchIndex} returned ${batchResults.length} results for ${batch.length} items`,
        );
      }
      results.push(...batchResults);
    }

    return results;
  }
}
