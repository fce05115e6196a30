/**
 * KeyedLock - Serializes async work per key inside one process.
 *
 * Tasks for the same key run one after another in arrival order; tasks for
 * different keys run concurrently. A failing task releases the lock like a
 * successful one.
 *
 * @example
 * ```typescript
 * const lock = new KeyedLock();
 * await lock.runExclusive('005930', () => processTicker('005930'));
 * ```
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
