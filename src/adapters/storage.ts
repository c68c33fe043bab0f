/**
 * Key-value storage port and its in-memory adapter
 */

import * as TE from 'fp-ts/TaskEither';
import * as O from 'fp-ts/Option';
import type { TaskEither } from 'fp-ts/TaskEither';
import type { Option } from 'fp-ts/Option';
import type { SyncError } from '../types/errors';

// Storage operations interface
export interface StorageOperations<V> {
  readonly get: (key: string) => TaskEither<SyncError, Option<V>>;
  readonly set: (key: string, value: V) => TaskEither<SyncError, void>;
  readonly delete: (key: string) => TaskEither<SyncError, void>;
  readonly list: (prefix: string) => TaskEither<SyncError, ReadonlyArray<string>>;
}

// In-memory storage adapter
export const createMemoryAdapter = <V>(): StorageOperations<V> => {
  const storage = new Map<string, V>();

  return {
    get: (key) => TE.fromIO(() => O.fromNullable(storage.get(key))),

    set: (key, value) => TE.fromIO(() => void storage.set(key, value)),

    delete: (key) => TE.fromIO(() => void storage.delete(key)),

    list: (prefix) =>
      TE.fromIO(() => Array.from(storage.keys()).filter((key) => key.startsWith(prefix))),
  };
};
