/**
 * Per-key mutual exclusion for async work
 */

import type { Task } from 'fp-ts/Task';

export interface KeyedLock {
  readonly run: <A>(key: string, task: Task<A>) => Task<A>;
  readonly isLocked: (key: string) => boolean;
}

export const createKeyedLock = (): KeyedLock => {
  // Tail of the queue per key; removed once the last holder finishes
  const tails = new Map<string, Promise<void>>();

  const run = <A>(key: string, task: Task<A>): Task<A> => async () => {
    const previous = tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (tails.get(key) === tail) {
        tails.delete(key);
      }
    }
  };

  return {
    run,
    isLocked: (key) => tails.has(key),
  };
};
