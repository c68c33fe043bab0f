/**
 * Tests for batch processing utilities
 */

import { describe, it, expect } from 'vitest';
import * as T from 'fp-ts/Task';
import { chunkArray, mapWithConcurrency, pullBatches } from './batch';

async function* countTo(n: number, pulled: number[]): AsyncGenerator<number> {
  for (let i = 1; i <= n; i++) {
    pulled.push(i);
    yield i;
  }
}

describe('Batch Processing', () => {
  describe('chunkArray', () => {
    it('should split array into chunks', () => {
      const chunks = chunkArray([1, 2, 3, 4, 5, 6, 7, 8, 9, 10], 3);

      expect(chunks).toEqual([[1, 2, 3], [4, 5, 6], [7, 8, 9], [10]]);
    });

    it('should handle empty array and invalid size', () => {
      expect(chunkArray([], 5)).toEqual([]);
      expect(chunkArray([1, 2, 3], 0)).toEqual([]);
    });
  });

  describe('mapWithConcurrency', () => {
    it('should keep input order', async () => {
      const result = await mapWithConcurrency([3, 1, 2], 2, (n) => T.delay(n * 5)(T.of(n * 10)))();

      expect(result).toEqual([30, 10, 20]);
    });

    it('should never run more than the limit at once', async () => {
      let running = 0;
      let peak = 0;
      const items = Array.from({ length: 7 }, (_, i) => i);

      await mapWithConcurrency(items, 3, (n) => async () => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
        return n;
      })();

      expect(peak).toBe(3);
    });

    it('should return empty for no items', async () => {
      expect(await mapWithConcurrency([], 4, (n: number) => T.of(n))()).toEqual([]);
    });
  });

  describe('pullBatches', () => {
    it('should yield full batches and a trailing partial one', async () => {
      const pulled: number[] = [];
      const batches: ReadonlyArray<number>[] = [];
      for await (const batch of pullBatches(countTo(5, pulled), 2)) {
        batches.push(batch);
      }

      expect(batches).toEqual([[1, 2], [3, 4], [5]]);
    });

    it('should not read ahead of the consumer', async () => {
      const pulled: number[] = [];
      const iterator = pullBatches(countTo(10, pulled), 3)[Symbol.asyncIterator]();

      const first = await iterator.next();

      expect(first.value).toEqual([1, 2, 3]);
      expect(pulled).toEqual([1, 2, 3]);
    });
  });
});
