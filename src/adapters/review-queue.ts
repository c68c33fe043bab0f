/**
 * Manual review queue port and its in-memory stand-in
 */

import * as TE from 'fp-ts/TaskEither';
import { Subject } from 'rxjs';
import type { TaskEither } from 'fp-ts/TaskEither';
import type { DataConflict, DataRecord, FieldMap, Stream, Timestamp, TransformedRecord } from '../types';
import type { SyncError } from '../types/errors';

// A resource whose conflicts could not be resolved automatically
export interface ReviewItem {
  readonly syncId?: string;
  readonly resourceType: string;
  readonly resourceId: string;
  readonly conflicts: ReadonlyArray<DataConflict>;
  readonly transformed: TransformedRecord;
  readonly target?: DataRecord;
  readonly reason: string;
  readonly submittedAt: Timestamp;
}

// Reviewer's answer: values for conflicted fields, a side for record-level conflicts
export interface ReviewDecision {
  readonly resourceType: string;
  readonly resourceId: string;
  readonly fields?: FieldMap;
  readonly side?: 'source' | 'target';
  readonly reviewer?: string;
  readonly note?: string;
}

export interface ReviewQueue {
  readonly submit: (item: ReviewItem) => TaskEither<SyncError, void>;
  readonly decisions$?: Stream<ReviewDecision>;
}

export interface MemoryReviewQueue extends ReviewQueue {
  readonly decisions$: Stream<ReviewDecision>;
  readonly pending: () => ReadonlyArray<ReviewItem>;
  readonly decide: (decision: ReviewDecision) => void;
  readonly close: () => void;
}

export const createMemoryReviewQueue = (): MemoryReviewQueue => {
  const items = new Map<string, ReviewItem>();
  const decisionsSubject = new Subject<ReviewDecision>();

  return {
    submit: (item) => TE.fromIO(() => void items.set(`${item.resourceType}:${item.resourceId}`, item)),

    decisions$: decisionsSubject.asObservable(),

    pending: () => Array.from(items.values()),

    decide: (decision) => {
      items.delete(`${decision.resourceType}:${decision.resourceId}`);
      decisionsSubject.next(decision);
    },

    close: () => decisionsSubject.complete(),
  };
};
