/**
 * Batch processing utilities
 */

import { pipe } from 'fp-ts/function';
import * as A from 'fp-ts/Array';
import * as T from 'fp-ts/Task';
import type { Task } from 'fp-ts/Task';

// Chunk array into smaller arrays
export const chunkArray = <A>(
  array: ReadonlyArray<A>,
  size: number,
): ReadonlyArray<ReadonlyArray<A>> => {
  if (size <= 0 || array.length === 0) {
    return [];
  }

  const chunks: A[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }

  return chunks;
};

// Run at most `concurrency` tasks at a time, results in input order
export const mapWithConcurrency = <A, B>(
  items: ReadonlyArray<A>,
  concurrency: number,
  f: (item: A, index: number) => Task<B>,
): Task<ReadonlyArray<B>> => {
  if (items.length === 0) {
    return T.of([]);
  }

  const indexed = items.map((item, index) => ({ item, index }));
  return pipe(
    A.chunksOf(Math.max(1, concurrency))(indexed),
    A.traverse(T.ApplicativeSeq)((group) =>
      pipe(
        group,
        A.traverse(T.ApplicativePar)(({ item, index }) => f(item, index)),
      ),
    ),
    T.map(A.flatten),
  );
};

// Pull fixed-size batches; the next batch is read only when the consumer asks for it
export async function* pullBatches<A>(
  source: AsyncIterable<A>,
  size: number,
): AsyncGenerator<ReadonlyArray<A>, void, undefined> {
  let batch: A[] = [];
  for await (const item of source) {
    batch.push(item);
    if (batch.length >= size) {
      yield batch;
      batch = [];
    }
  }
  if (batch.length > 0) {
    yield batch;
  }
}
