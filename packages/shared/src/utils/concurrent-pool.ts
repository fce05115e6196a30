/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * The pool keeps up to N workers busy at all times. When a worker finishes an
 * item it immediately takes the next one, so a slow item never holds back a
 * whole batch.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently using a worker pool pattern.
   *
   * Results keep the original item order regardless of completion order.
   * The first rejection rejects the whole run; workers already in flight
   * are not cancelled.
   *
   * @param concurrency - Maximum number of concurrent workers (at least 1)
   * @param onItemComplete - Optional callback fired after each item completes
   */
  static async run<T, R>(
    items: T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (result: R, index: number) => void,
  ): Promise<R[]> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(
        `Concurrency must be a positive integer, got ${concurrency}`,
      );
    }

    const results: R[] = new Array(items.length);
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length) {
        const index = nextIndex++;
        results[index] = await processFn(items[index], index);
        onItemComplete?.(results[index], index);
      }
    }

    const workers = Array.from(
      { length: Math.min(concurrency, items.length) },
      () => worker(),
    );
    await Promise.all(workers);
    return results;
  }

  /**
   * Same as {@link ConcurrentPool.run}, but never rejects.
   *
   * Every item settles independently; a rejection is captured as a
   * `rejected` entry at the item's index and its siblings keep running.
   */
  static async runSettled<T, R>(
    items: T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (result: PromiseSettledResult<R>, index: number) => void,
  ): Promise<PromiseSettledResult<R>[]> {
    return this.run(
      items,
      concurrency,
      async (item, index): Promise<PromiseSettledResult<R>> => {
        try {
          return { status: 'fulfilled', value: await processFn(item, index) };
        } catch (reason) {
          return { status: 'rejected', reason };
        }
      },
      onItemComplete,
    );
  }
}
