/**
 * Target store port, HTTP client and in-memory stand-in
 */

import { pipe } from 'fp-ts/function';
import * as TE from 'fp-ts/TaskEither';
import * as E from 'fp-ts/Either';
import * as O from 'fp-ts/Option';
import * as t from 'io-ts';
import type { TaskEither } from 'fp-ts/TaskEither';
import type { Option } from 'fp-ts/Option';
import type { DataRecord, FieldMap, Timestamp } from '../types';
import type { SyncError } from '../types/errors';
import { transientIOError, unknownError } from '../types/errors';
import { validate, DataRecordCodec } from '../types/schemas';

// Writes carry the target version they were planned against
export type TargetWrite =
  | {
      readonly kind: 'upsert';
      readonly resourceType: string;
      readonly resourceId: string;
      readonly sourceSystem: string;
      readonly fields: FieldMap;
      readonly mappingVersion: number;
      readonly expectedUpdatedAt?: Timestamp;
    }
  | {
      readonly kind: 'delete';
      readonly resourceType: string;
      readonly resourceId: string;
      readonly expectedUpdatedAt?: Timestamp;
    };

export type ApplyOutcome =
  | { readonly status: 'ok'; readonly updatedAt: Timestamp }
  | { readonly status: 'conflict' };

export interface TargetStore {
  readonly get: (resourceType: string, resourceId: string) => TaskEither<SyncError, Option<DataRecord>>;
  // Implementations stop the write when the signal aborts, where they can
  readonly apply: (write: TargetWrite, signal?: AbortSignal) => TaskEither<SyncError, ApplyOutcome>;
}

// HTTP target store configuration
export interface HttpTargetStoreConfig {
  readonly apiUrl: string;
  readonly token: string;
  readonly timeout?: number;
}

const DEFAULT_TIMEOUT = 30000;

const ApiErrorCodec = t.type({ error: t.string });

const ApplyResponseCodec = t.type({ updatedAt: t.number });

// HTTP request helper
const fetchWithTimeout = (
  url: string,
  options: RequestInit,
  timeout: number,
  operation: string,
  signal?: AbortSignal,
): TaskEither<SyncError, Response> =>
  TE.tryCatch(
    async () => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);
      const forward = (): void => controller.abort();
      if (signal?.aborted === true) {
        controller.abort();
      }
      signal?.addEventListener('abort', forward, { once: true });

      try {
        return await fetch(url, {
          ...options,
          signal: controller.signal,
        });
      } finally {
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', forward);
      }
    },
    (error) => {
      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          return transientIOError(`${operation} timed out after ${timeout}ms`, operation);
        }
        return transientIOError(error.message, operation);
      }
      return unknownError('Network request failed', error);
    },
  );

const readJson = (response: Response, operation: string): TaskEither<SyncError, unknown> =>
  TE.tryCatch(
    (): Promise<unknown> => response.json(),
    (error) => unknownError(`${operation} returned a body that is not JSON`, error),
  );

// 5xx and 429 are worth retrying, other statuses are not
const httpError = (response: Response, operation: string): TaskEither<SyncError, never> =>
  pipe(
    readJson(response, operation),
    TE.map((body) =>
      pipe(
        validate(ApiErrorCodec)(body),
        E.match(
          () => `HTTP ${response.status}`,
          (apiError) => apiError.error,
        ),
      ),
    ),
    TE.orElse(() => TE.of(`HTTP ${response.status}`)),
    TE.chain((message) =>
      TE.left(
        transientIOError(message, operation, response.status >= 500 || response.status === 429, {
          status: response.status,
        }),
      ),
    ),
  );

// Parse API response
const parseResponse = <A>(
  response: Response,
  codec: t.Decoder<unknown, A>,
  operation: string,
): TaskEither<SyncError, A> =>
  response.ok
    ? pipe(readJson(response, operation), TE.chainEitherKW(validate(codec)))
    : httpError(response, operation);

const resourceUrl = (apiUrl: string, resourceType: string, resourceId: string): string =>
  `${apiUrl}/resources/${encodeURIComponent(resourceType)}/${encodeURIComponent(resourceId)}`;

// Create HTTP target store
export const createHttpTargetStore = (config: HttpTargetStoreConfig): TargetStore => {
  const timeout = config.timeout ?? DEFAULT_TIMEOUT;

  const headers = (): Record<string, string> => ({
    'Content-Type': 'application/json',
    Authorization: `Bearer ${config.token}`,
  });

  return {
    get: (resourceType, resourceId) =>
      pipe(
        fetchWithTimeout(
          resourceUrl(config.apiUrl, resourceType, resourceId),
          { method: 'GET', headers: headers() },
          timeout,
          'target.get',
        ),
        TE.chain((response): TaskEither<SyncError, Option<DataRecord>> =>
          response.status === 404
            ? TE.of(O.none)
            : pipe(parseResponse(response, DataRecordCodec, 'target.get'), TE.map(O.some)),
        ),
      ),

    apply: (write, signal) =>
      pipe(
        fetchWithTimeout(
          resourceUrl(config.apiUrl, write.resourceType, write.resourceId),
          write.kind === 'upsert'
            ? {
                method: 'PUT',
                headers: headers(),
                body: JSON.stringify({
                  sourceSystem: write.sourceSystem,
                  fields: write.fields,
                  mappingVersion: write.mappingVersion,
                  expectedUpdatedAt: write.expectedUpdatedAt ?? null,
                }),
              }
            : {
                method: 'DELETE',
                headers: headers(),
                body: JSON.stringify({ expectedUpdatedAt: write.expectedUpdatedAt ?? null }),
              },
          timeout,
          'target.apply',
          signal,
        ),
        TE.chain((response): TaskEither<SyncError, ApplyOutcome> =>
          response.status === 409
            ? TE.of({ status: 'conflict' })
            : pipe(
                parseResponse(response, ApplyResponseCodec, 'target.apply'),
                TE.map(({ updatedAt }): ApplyOutcome => ({ status: 'ok', updatedAt })),
              ),
        ),
      ),
  };
};

export interface MemoryTargetStore extends TargetStore {
  // Edit made directly in the target system, outside any sync
  readonly put: (record: DataRecord) => void;
  readonly records: () => ReadonlyArray<DataRecord>;
  readonly writes: () => number;
}

const keyOf = (resourceType: string, resourceId: string): string => `${resourceType}:${resourceId}`;

// In-memory target store with optimistic version checks; effects run when the task runs
export const createMemoryTargetStore = (
  initial: ReadonlyArray<DataRecord> = [],
  now: () => Timestamp = Date.now,
): MemoryTargetStore => {
  const store = new Map<string, DataRecord>();
  let writeCount = 0;

  const put = (record: DataRecord): void => {
    store.set(keyOf(record.resourceType, record.resourceId), record);
  };
  initial.forEach(put);

  return {
    put,

    records: () => Array.from(store.values()),

    writes: () => writeCount,

    get: (resourceType, resourceId) =>
      TE.fromIO(() => O.fromNullable(store.get(keyOf(resourceType, resourceId)))),

    apply: (write) =>
      TE.fromIO((): ApplyOutcome => {
        const key = keyOf(write.resourceType, write.resourceId);
        const current = store.get(key);
        if (current?.updatedAt !== write.expectedUpdatedAt) {
          return { status: 'conflict' };
        }

        // Stored versions only move forward
        const updatedAt = Math.max(now(), (current?.updatedAt ?? 0) + 1);
        writeCount++;
        if (write.kind === 'delete') {
          store.delete(key);
        } else {
          store.set(key, {
            resourceType: write.resourceType,
            resourceId: write.resourceId,
            sourceSystem: write.sourceSystem,
            fields: write.fields,
            updatedAt,
            mappingVersion: write.mappingVersion,
            ...(current?.readOnly === undefined ? {} : { readOnly: current.readOnly }),
          });
        }
        return { status: 'ok', updatedAt };
      }),
  };
};
