/**
 * Extraction adapter port and its in-memory stand-in
 */

import * as E from 'fp-ts/Either';
import * as TE from 'fp-ts/TaskEither';
import type { Either } from 'fp-ts/Either';
import type { TaskEither } from 'fp-ts/TaskEither';
import type { DataRecord, ExtractionFilter } from '../types';
import type { SyncError } from '../types/errors';
import { transientIOError } from '../types/errors';
import { createRecordFilter } from '../sync/filter';

export type ExtractionItem = Either<SyncError, DataRecord>;

// Records of one resource type, pulled lazily by the coordinator
export interface ExtractionAdapter {
  readonly extract: (resourceType: string, filter: ExtractionFilter) => AsyncIterable<ExtractionItem>;
  readonly refetch?: (resourceType: string, resourceId: string) => TaskEither<SyncError, DataRecord>;
}

export interface MemoryExtractionAdapter extends ExtractionAdapter {
  readonly put: (record: DataRecord) => void;
  readonly fail: (resourceType: string, error: SyncError) => void;
  readonly pulled: () => number;
}

const keyOf = (resourceType: string, resourceId: string): string => `${resourceType}:${resourceId}`;

// Failed items are replayed in insertion order together with the records
export const createMemoryExtractionAdapter = (
  records: ReadonlyArray<DataRecord> = [],
): MemoryExtractionAdapter => {
  const items: Array<{ readonly resourceType: string; readonly item: ExtractionItem }> = [];
  const latest = new Map<string, DataRecord>();
  let pulledCount = 0;

  const put = (record: DataRecord): void => {
    const key = keyOf(record.resourceType, record.resourceId);
    const index = items.findIndex(
      ({ item }) =>
        E.isRight(item) && keyOf(item.right.resourceType, item.right.resourceId) === key,
    );
    const entry = { resourceType: record.resourceType, item: E.right(record) };
    if (index === -1) {
      items.push(entry);
    } else {
      items[index] = entry;
    }
    latest.set(key, record);
  };

  records.forEach(put);

  return {
    put,

    fail: (resourceType, error) => {
      items.push({ resourceType, item: E.left(error) });
    },

    pulled: () => pulledCount,

    extract: (resourceType, filter) => {
      const keep = createRecordFilter(filter.filters);
      const since = filter.since;
      const snapshot = items.filter((entry) => entry.resourceType === resourceType);

      return {
        async *[Symbol.asyncIterator]() {
          for (const { item } of snapshot) {
            if (E.isRight(item)) {
              const record = item.right;
              if ((since !== undefined && record.updatedAt <= since) || !keep(record)) {
                continue;
              }
            }
            pulledCount++;
            yield item;
          }
        },
      };
    },

    refetch: (resourceType, resourceId) => {
      const record = latest.get(keyOf(resourceType, resourceId));
      return record === undefined
        ? TE.left(
            transientIOError(`${resourceType}/${resourceId} is not available`, 'extract.refetch', false, {
              resourceId,
            }),
          )
        : TE.of(record);
    },
  };
};
