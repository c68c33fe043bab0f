/**
 * Last sync point and applied checksum per resource, incremental resume point per scope
 */

import { pipe } from 'fp-ts/function';
import * as TE from 'fp-ts/TaskEither';
import * as O from 'fp-ts/Option';
import type { TaskEither } from 'fp-ts/TaskEither';
import type { Option } from 'fp-ts/Option';
import type { SyncError, Timestamp } from '../types';
import type { StorageOperations } from '../adapters/storage';
import { createMemoryAdapter } from '../adapters/storage';

export interface ResourceSyncPoint {
  readonly lastSyncAt: Timestamp;
  readonly checksum: string;
}

export type LedgerEntry =
  | ({ readonly kind: 'resource' } & ResourceSyncPoint)
  | { readonly kind: 'run'; readonly syncedThrough: Timestamp };

export interface RunScope {
  readonly providerId: string;
  readonly ehrSystem: string;
  readonly resourceType: string;
}

export interface SyncLedger {
  readonly getResource: (
    resourceType: string,
    resourceId: string,
  ) => TaskEither<SyncError, Option<ResourceSyncPoint>>;
  readonly recordApplied: (
    resourceType: string,
    resourceId: string,
    point: ResourceSyncPoint,
  ) => TaskEither<SyncError, void>;
  // Incremental runs pull records updated after this point
  readonly getLastRun: (scope: RunScope) => TaskEither<SyncError, Option<Timestamp>>;
  readonly recordRun: (scope: RunScope, syncedThrough: Timestamp) => TaskEither<SyncError, void>;
}

// Storage key prefixes
const RESOURCE_PREFIX = 'resource:';
const RUN_PREFIX = 'run:';

const resourceKey = (resourceType: string, resourceId: string): string =>
  `${RESOURCE_PREFIX}${resourceType}:${resourceId}`;

const runKey = (scope: RunScope): string =>
  `${RUN_PREFIX}${scope.providerId}:${scope.ehrSystem}:${scope.resourceType}`;

export const createSyncLedger = (
  storage: StorageOperations<LedgerEntry> = createMemoryAdapter<LedgerEntry>(),
): SyncLedger => ({
  getResource: (resourceType, resourceId) =>
    pipe(
      storage.get(resourceKey(resourceType, resourceId)),
      TE.map(
        O.chain((entry) =>
          entry.kind === 'resource'
            ? O.some({ lastSyncAt: entry.lastSyncAt, checksum: entry.checksum })
            : O.none,
        ),
      ),
    ),

  recordApplied: (resourceType, resourceId, point) =>
    storage.set(resourceKey(resourceType, resourceId), { kind: 'resource', ...point }),

  getLastRun: (scope) =>
    pipe(
      storage.get(runKey(scope)),
      TE.map(O.chain((entry) => (entry.kind === 'run' ? O.some(entry.syncedThrough) : O.none))),
    ),

  recordRun: (scope, syncedThrough) => storage.set(runKey(scope), { kind: 'run', syncedThrough }),
});
