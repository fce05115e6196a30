import { describe, expect, test, vi } from 'vitest';

import { ConcurrentPool } from './concurrent-pool';

describe('ConcurrentPool', () => {
  describe('run', () => {
    test('processes all items and returns results in order', async () => {
      const results = await ConcurrentPool.run(
        [1, 2, 3, 4, 5],
        3,
        async (item) => item * 10,
      );

      expect(results).toEqual([10, 20, 30, 40, 50]);
    });

    test('returns empty array for empty input', async () => {
      const results = await ConcurrentPool.run(
        [],
        5,
        async (item: number) => item,
      );

      expect(results).toEqual([]);
    });

    test('does not exceed concurrency limit', async () => {
      let activeTasks = 0;
      let maxConcurrent = 0;
      const items = Array.from({ length: 10 }, (_, i) => i);

      await ConcurrentPool.run(items, 3, async (item) => {
        activeTasks++;
        maxConcurrent = Math.max(maxConcurrent, activeTasks);
        await new Promise((resolve) => setTimeout(resolve, 10));
        activeTasks--;
        return item;
      });

      expect(maxConcurrent).toBe(3);
    });

    test('calls onItemComplete callback for each completed item', async () => {
      const onItemComplete = vi.fn();

      await ConcurrentPool.run(
        ['a', 'b', 'c'],
        2,
        async (item) => item.toUpperCase(),
        onItemComplete,
      );

      expect(onItemComplete).toHaveBeenCalledTimes(3);
      expect(onItemComplete).toHaveBeenCalledWith('A', 0);
      expect(onItemComplete).toHaveBeenCalledWith('B', 1);
      expect(onItemComplete).toHaveBeenCalledWith('C', 2);
    });

    test('maintains result order even with varying processing times', async () => {
      const results = await ConcurrentPool.run([3, 1, 2], 3, async (item) => {
        await new Promise((resolve) => setTimeout(resolve, item * 10));
        return `result-${item}`;
      });

      expect(results).toEqual(['result-3', 'result-1', 'result-2']);
    });

    test('processes sequentially with concurrency of 1', async () => {
      const order: number[] = [];

      await ConcurrentPool.run([1, 2, 3], 1, async (item) => {
        order.push(item);
        return item;
      });

      expect(order).toEqual([1, 2, 3]);
    });

    test('propagates errors from processFn', async () => {
      await expect(
        ConcurrentPool.run([1, 2, 3], 2, async (item) => {
          if (item === 2) throw new Error('Processing failed');
          return item;
        }),
      ).rejects.toThrow('Processing failed');
    });

    test('rejects a non-positive concurrency', async () => {
      await expect(
        ConcurrentPool.run([1], 0, async (item) => item),
      ).rejects.toThrow('Concurrency must be a positive integer, got 0');
    });
  });

  describe('runSettled', () => {
    test('captures rejections without stopping siblings', async () => {
      const processed: number[] = [];

      const results = await ConcurrentPool.runSettled(
        [1, 2, 3],
        2,
        async (item) => {
          processed.push(item);
          if (item === 2) throw new Error('page 2 failed');
          return item * 100;
        },
      );

      expect(processed.sort()).toEqual([1, 2, 3]);
      expect(results[0]).toEqual({ status: 'fulfilled', value: 100 });
      expect(results[1].status).toBe('rejected');
      expect(results[2]).toEqual({ status: 'fulfilled', value: 300 });
    });

    test('keeps the rejection reason', async () => {
      const reason = new Error('boom');

      const [result] = await ConcurrentPool.runSettled([1], 1, async () => {
        throw reason;
      });

      expect(result).toEqual({ status: 'rejected', reason });
    });

    test('reports settled results to onItemComplete', async () => {
      const onItemComplete = vi.fn();

      await ConcurrentPool.runSettled(
        ['x'],
        1,
        async (item) => item,
        onItemComplete,
      );

      expect(onItemComplete).toHaveBeenCalledWith(
        { status: 'fulfilled', value: 'x' },
        0,
      );
    });
  });
});
