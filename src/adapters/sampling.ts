/**
 * Sampling source port and its in-memory stand-in
 */

import * as TE from 'fp-ts/TaskEither';
import type { TaskEither } from 'fp-ts/TaskEither';
import type { DataSample, DataSourceRef, TimeRange } from '../types';
import type { SyncError } from '../types/errors';

export interface SampleRequest {
  readonly sampleSize: number;
  readonly timeRange?: TimeRange;
}

// Read-only access to records for consistency auditing
export interface SamplingSource {
  readonly sample: (
    source: DataSourceRef,
    request: SampleRequest,
  ) => TaskEither<SyncError, ReadonlyArray<DataSample>>;
  // Existence check for referenced resources that were not sampled
  readonly exists?: (resourceType: string, resourceId: string) => TaskEither<SyncError, boolean>;
}

export const inTimeRange = (sampledAt: number, range: TimeRange | undefined): boolean =>
  range === undefined || (sampledAt >= range.start && sampledAt <= range.end);

export const createMemorySamplingSource = (
  samples: ReadonlyArray<DataSample>,
  known: ReadonlyArray<{ readonly resourceType: string; readonly resourceId: string }> = [],
): SamplingSource => {
  const existing = new Set(known.map((ref) => `${ref.resourceType}:${ref.resourceId}`));

  return {
    sample: (source, request) =>
      TE.of(
        samples
          .filter(
            (sample) =>
              sample.sourceId === source.sourceId &&
              sample.resourceType === source.resourceType &&
              inTimeRange(sample.sampledAt, request.timeRange),
          )
          .slice(0, request.sampleSize),
      ),

    exists: (resourceType, resourceId) => TE.of(existing.has(`${resourceType}:${resourceId}`)),
  };
};
