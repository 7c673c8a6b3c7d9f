/**
 * Parallel Processing Utilities Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { parallelMap, type ParallelOutcome } from './parallel.js';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function values<R>(outcomes: ParallelOutcome<R>[]): (R | string)[] {
  return outcomes.map((outcome) => {
    if (outcome.status === 'fulfilled') return outcome.value;
    if (outcome.status === 'rejected') return `error:${outcome.error.message}`;
    return 'skipped';
  });
}

describe('parallelMap', () => {
  describe('basic functionality', () => {
    it('should process all items and return outcomes in order', async () => {
      const result = await parallelMap([1, 2, 3, 4, 5], async (item) => item * 2);

      expect(values(result.outcomes)).toEqual([2, 4, 6, 8, 10]);
      expect(result.successCount).toBe(5);
      expect(result.errorCount).toBe(0);
      expect(result.skippedCount).toBe(0);
    });

    it('should handle an empty list', async () => {
      const result = await parallelMap([], async (item: number) => item);

      expect(result.outcomes).toEqual([]);
      expect(result.successCount).toBe(0);
    });

    it('should pass the index to the callback', async () => {
      const result = await parallelMap(['a', 'b', 'c'], async (item, index) => `${item}-${index}`);

      expect(values(result.outcomes)).toEqual(['a-0', 'b-1', 'c-2']);
    });

    it('should reject a non-positive concurrency', async () => {
      await expect(parallelMap([1], async (item) => item, { concurrency: 0 })).rejects.toThrow(
        'Concurrency must be a positive integer'
      );
    });
  });

  describe('concurrency', () => {
    it('should never exceed the concurrency limit', async () => {
      let maxConcurrent = 0;
      let currentConcurrent = 0;

      await parallelMap(
        Array.from({ length: 12 }, (_, i) => i),
        async (item) => {
          currentConcurrent++;
          maxConcurrent = Math.max(maxConcurrent, currentConcurrent);
          await sleep(5);
          currentConcurrent--;
          return item;
        },
        { concurrency: 3 }
      );

      expect(maxConcurrent).toBe(3);
    });

    it('should dispatch sequentially with a concurrency of 1', async () => {
      const order: number[] = [];

      await parallelMap(
        [1, 2, 3, 4],
        async (item) => {
          order.push(item);
          await sleep(1);
          return item;
        },
        { concurrency: 1 }
      );

      expect(order).toEqual([1, 2, 3, 4]);
    });

    it('should keep input order despite completion order', async () => {
      const result = await parallelMap(
        [3, 1, 2],
        async (item) => {
          await sleep(item * 5);
          return item;
        },
        { concurrency: 3 }
      );

      expect(values(result.outcomes)).toEqual([3, 1, 2]);
    });
  });

  describe('error handling', () => {
    it('should capture errors and keep going by default', async () => {
      const result = await parallelMap([1, 2, 3], async (item) => {
        if (item === 2) {
          throw new Error('Item 2 failed');
        }
        return item;
      });

      expect(values(result.outcomes)).toEqual([1, 'error:Item 2 failed', 3]);
      expect(result.successCount).toBe(2);
      expect(result.errorCount).toBe(1);
    });

    it('should convert non-Error throws', async () => {
      const result = await parallelMap([1], async () => {
        throw 'string error';
      });

      expect(values(result.outcomes)).toEqual(['error:string error']);
    });

    it('should stop dispatching after an error when stopOnError is set', async () => {
      const processed: number[] = [];

      const result = await parallelMap(
        [1, 2, 3, 4],
        async (item) => {
          processed.push(item);
          if (item === 2) {
            throw new Error('Stop here');
          }
          return item;
        },
        { concurrency: 1, stopOnError: true }
      );

      expect(processed).toEqual([1, 2]);
      expect(values(result.outcomes)).toEqual([1, 'error:Stop here', 'skipped', 'skipped']);
      expect(result.skippedCount).toBe(2);
    });
  });

  describe('stopping and progress', () => {
    it('should stop dispatching once shouldContinue returns false', async () => {
      let active = true;

      const result = await parallelMap(
        [1, 2, 3, 4, 5],
        async (item) => {
          if (item === 2) {
            active = false;
          }
          return item;
        },
        { concurrency: 1, shouldContinue: () => active }
      );

      expect(values(result.outcomes)).toEqual([1, 2, 'skipped', 'skipped', 'skipped']);
      expect(result.successCount).toBe(2);
      expect(result.skippedCount).toBe(3);
    });

    it('should report each settled item', async () => {
      const onSettled = vi.fn();

      await parallelMap(
        [1, 2],
        async (item) => {
          if (item === 2) {
            throw new Error('boom');
          }
          return item;
        },
        { concurrency: 1, onSettled }
      );

      expect(onSettled).toHaveBeenCalledTimes(2);
      expect(onSettled).toHaveBeenNthCalledWith(1, { status: 'fulfilled', value: 1 }, 0);
      expect(onSettled.mock.calls[1][0]).toMatchObject({ status: 'rejected' });
      expect(onSettled.mock.calls[1][1]).toBe(1);
    });
  });
});
