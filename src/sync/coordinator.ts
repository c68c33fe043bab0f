/**
 * Sync coordinator
 *
 * Drives one run per (provider, EHR system) through the batch pipeline:
 * extract, transform, plan against the target, resolve conflicts, apply.
 */

import { pipe } from 'fp-ts/function';
import * as E from 'fp-ts/Either';
import * as O from 'fp-ts/Option';
import * as T from 'fp-ts/Task';
import * as TE from 'fp-ts/TaskEither';
import type { Either } from 'fp-ts/Either';
import type { Option } from 'fp-ts/Option';
import type { Task } from 'fp-ts/Task';
import type { TaskEither } from 'fp-ts/TaskEither';
import { Subject } from 'rxjs';
import { mergeMap } from 'rxjs/operators';
import { v4 as uuidv4 } from 'uuid';
import type {
  ActiveSync,
  ConflictResolution,
  DataConflict,
  DataRecord,
  EngineConfig,
  FieldMap,
  FieldValue,
  ResolutionStrategy,
  SchemaMapping,
  StrategyBinding,
  Stream,
  SyncCounters,
  SyncErrorEntry,
  SyncRunOptions,
  SyncStatus,
  SyncWarningEntry,
  SynchronizationData,
  SynchronizationResult,
  Timestamp,
  TransformedRecord,
} from '../types';
import type { ConflictError, FatalRunError, SyncError, ValidationDetail, ValidationError } from '../types/errors';
import { fatalRunError, transientIOError, validationError } from '../types/errors';
import { validate, SynchronizationDataCodec } from '../types/schemas';
import type { Logger } from '../errors/handler';
import {
  calculateBackoff,
  consoleLogger,
  delay,
  isRetryable,
  logError,
  retryWithBackoff,
  toErrorEntry,
  toSyncError,
  withAbortTimeout,
  withTimeout,
} from '../errors/handler';
import type { SchemaCatalog } from '../catalog/schema-catalog';
import type { TransformationEngine } from '../transform/engine';
import type { ExtractionAdapter, ExtractionItem } from '../adapters/extraction';
import type { TargetStore, TargetWrite } from '../adapters/target-store';
import type { ReviewDecision, ReviewItem, ReviewQueue } from '../adapters/review-queue';
import type { ResourceSyncPoint, SyncLedger } from '../core/sync-ledger';
import type { KeyedLock } from '../utils/keyed-lock';
import { createKeyedLock } from '../utils/keyed-lock';
import { mapWithConcurrency, pullBatches } from '../utils/batch';
import { valuesEqual } from '../utils/checksum';
import type { ConflictDetector } from './conflict-detector';
import type { ConflictResolver } from './conflict-resolver';
import { activeFilters, createRecordFilter } from './filter';
import { isTerminal, transition } from './run-state';

export type CoordinatorSettings = Pick<
  EngineConfig,
  'strategies' | 'defaultStrategy' | 'retryPolicy' | 'batchSize' | 'abortThreshold' | 'recordTimeoutMs'
>;

export interface CoordinatorDeps {
  readonly catalog: SchemaCatalog;
  readonly transformer: TransformationEngine;
  readonly detector: ConflictDetector;
  readonly resolver: ConflictResolver;
  readonly extraction: ExtractionAdapter;
  readonly target: TargetStore;
  readonly reviewQueue: ReviewQueue;
  readonly ledger: SyncLedger;
  readonly resourceLocks?: KeyedLock;
  readonly logger?: Logger;
  readonly now?: () => Timestamp;
  readonly generateId?: () => string;
}

export type RecordOutcome = 'created' | 'updated' | 'deleted' | 'unchanged';

// Progress events
export type SyncEvent =
  | {
      readonly type: 'status-changed';
      readonly syncId: string;
      readonly from: SyncStatus;
      readonly to: SyncStatus;
      readonly at: Timestamp;
    }
  | {
      readonly type: 'record-settled';
      readonly syncId: string;
      readonly resourceType: string;
      readonly resourceId: string;
      readonly outcome: RecordOutcome;
      readonly at: Timestamp;
    }
  | {
      readonly type: 'record-deferred';
      readonly syncId: string;
      readonly resourceType: string;
      readonly resourceId: string;
      readonly conflicts: number;
      readonly at: Timestamp;
    }
  | {
      readonly type: 'record-failed';
      readonly syncId: string;
      readonly resourceType: string;
      readonly error: SyncErrorEntry;
      readonly at: Timestamp;
    }
  | {
      readonly type: 'retry-scheduled';
      readonly syncId?: string;
      readonly operation: string;
      readonly attempt: number;
      readonly delayMs: number;
      readonly at: Timestamp;
    }
  | {
      readonly type: 'batch-completed';
      readonly syncId: string;
      readonly resourceType: string;
      readonly batch: number;
      readonly recordsProcessed: number;
      readonly recordsFailed: number;
      readonly at: Timestamp;
    }
  | {
      readonly type: 'manual-resolution-applied';
      readonly resourceType: string;
      readonly resourceId: string;
      readonly outcome: RecordOutcome;
      readonly at: Timestamp;
    };

export interface ManualResolutionResult {
  readonly resourceType: string;
  readonly resourceId: string;
  readonly outcome: RecordOutcome;
  readonly resolutions: ReadonlyArray<ConflictResolution>;
}

export interface SyncCoordinator {
  readonly startSync: (
    request: SynchronizationData,
  ) => TaskEither<ValidationError, SynchronizationResult>;
  readonly cancelSync: (syncId: string) => boolean;
  readonly getActiveSync: (syncId: string) => Option<ActiveSync>;
  readonly applyManualResolution: (
    decision: ReviewDecision,
  ) => TaskEither<SyncError, ManualResolutionResult>;
  readonly state$: Stream<ActiveSync>;
  readonly events$: Stream<SyncEvent>;
  readonly dispose: () => void;
}

// What to do with one transformed record against one target version
type Audited = {
  readonly conflicts: ReadonlyArray<DataConflict>;
  readonly resolutions: ReadonlyArray<ConflictResolution>;
};

export type Plan =
  | ({ readonly kind: 'noop'; readonly markSynced: boolean } & Audited)
  | ({ readonly kind: 'upsert'; readonly fields: FieldMap } & Audited)
  | ({ readonly kind: 'delete' } & Audited)
  | { readonly kind: 'defer'; readonly conflicts: ReadonlyArray<DataConflict>; readonly error: ConflictError };

export interface RunTarget {
  readonly resourceType: string;
  readonly mapping: SchemaMapping;
  readonly strategy: ResolutionStrategy;
}

interface Planner {
  readonly detector: ConflictDetector;
  readonly resolver: ConflictResolver;
}

const untouched = (markSynced: boolean): Plan => ({
  kind: 'noop',
  markSynced,
  conflicts: [],
  resolutions: [],
});

const writeFor = (
  transformed: TransformedRecord,
  current: DataRecord,
  audited: Audited,
  resolved: FieldMap = {},
): Plan => {
  if (transformed.deleted === true) {
    return { kind: 'delete', ...audited };
  }
  const fields: FieldMap = { ...current.fields, ...transformed.fields, ...resolved };
  return valuesEqual(fields, current.fields)
    ? { kind: 'noop', markSynced: true, ...audited }
    : { kind: 'upsert', fields, ...audited };
};

// Pure planning step; the coordinator re-plans whenever the target moves
export const planRecord = (
  transformed: TransformedRecord,
  target: Option<DataRecord>,
  syncPoint: Option<ResourceSyncPoint>,
  runTarget: RunTarget,
  planner: Planner,
): Plan => {
  if (O.isNone(target)) {
    return transformed.deleted === true
      ? untouched(false)
      : { kind: 'upsert', fields: transformed.fields, conflicts: [], resolutions: [] };
  }
  const current = target.value;
  const point = O.toUndefined(syncPoint);

  // Already applied, or the source has not moved since the last sync
  if (
    point !== undefined &&
    (point.checksum === transformed.checksum || transformed.updatedAt <= point.lastSyncAt)
  ) {
    return untouched(false);
  }

  const conflicts = planner.detector.detect(transformed, current, point?.lastSyncAt, runTarget.mapping);
  if (conflicts.length === 0) {
    return writeFor(transformed, current, { conflicts, resolutions: [] });
  }

  const resolution = planner.resolver.resolveResource(conflicts, runTarget.strategy);
  if (resolution.status === 'pending') {
    return { kind: 'defer', conflicts, error: resolution.error };
  }
  const audited = { conflicts, resolutions: resolution.resolutions };
  if (resolution.recordSide === 'target') {
    return { kind: 'noop', markSynced: true, ...audited };
  }
  return writeFor(transformed, current, audited, resolution.fields);
};

const specificity = (binding: StrategyBinding): number =>
  [binding.providerId, binding.ehrSystem, binding.resourceType].filter((key) => key !== undefined).length;

// Most specific matching binding wins; earlier bindings win ties
export const selectStrategy = (
  bindings: ReadonlyArray<StrategyBinding>,
  defaultStrategy: ResolutionStrategy | undefined,
  providerId: string,
  ehrSystem: string,
  resourceType: string,
): Option<ResolutionStrategy> => {
  const best = bindings
    .filter(
      (binding) =>
        (binding.providerId === undefined || binding.providerId === providerId) &&
        (binding.ehrSystem === undefined || binding.ehrSystem === ehrSystem) &&
        (binding.resourceType === undefined || binding.resourceType === resourceType),
    )
    .reduce<StrategyBinding | undefined>(
      (acc, binding) =>
        acc === undefined || specificity(binding) > specificity(acc) ? binding : acc,
      undefined,
    );
  return best === undefined ? O.fromNullable(defaultStrategy) : O.some(best.strategy);
};

interface RunSettings {
  readonly retryPolicy: EngineConfig['retryPolicy'];
  readonly batchSize: number;
  readonly abortThreshold: number;
  readonly recordTimeoutMs: number;
}

const runSettings = (settings: CoordinatorSettings, options: SyncRunOptions = {}): RunSettings => ({
  retryPolicy: options.retryPolicy ?? settings.retryPolicy,
  batchSize: options.batchSize ?? settings.batchSize,
  abortThreshold: options.abortThreshold ?? settings.abortThreshold,
  recordTimeoutMs: options.recordTimeoutMs ?? settings.recordTimeoutMs,
});

type MutableCounters = { -readonly [K in keyof SyncCounters]: SyncCounters[K] };

interface RunContext {
  readonly syncId: string;
  readonly request: SynchronizationData;
  readonly settings: RunSettings;
  readonly startedAt: Timestamp;
  readonly counters: MutableCounters;
  readonly errors: SyncErrorEntry[];
  readonly warnings: SyncWarningEntry[];
  readonly conflicts: DataConflict[];
  readonly resolutions: ConflictResolution[];
  readonly pending: string[];
  // Earliest updatedAt of a failed record per resource type; null when a failure had no record
  readonly heldBack: Map<string, Timestamp | null>;
  readonly since: Map<string, Timestamp>;
  status: SyncStatus;
  updatedAt: Timestamp;
  completedAt?: Timestamp;
  cancelRequested: boolean;
}

// Retry and event scope shared by runs and manual resolutions
interface Scope {
  readonly syncId?: string;
  readonly settings: RunSettings;
}

type RunEnd =
  | { readonly status: 'completed' }
  | { readonly status: 'cancelled' }
  | { readonly status: 'failed'; readonly error: FatalRunError };

interface Slot<A> {
  readonly resourceId?: string;
  readonly result: Either<SyncError, A>;
}

interface Prepared {
  readonly transformed: TransformedRecord;
  readonly current: Option<DataRecord>;
  readonly plan: Plan;
}

type ApplyResult =
  | ({ readonly kind: 'done'; readonly outcome: RecordOutcome } & Audited)
  | {
      readonly kind: 'deferred';
      readonly transformed: TransformedRecord;
      readonly target: Option<DataRecord>;
      readonly conflicts: ReadonlyArray<DataConflict>;
      readonly error: ConflictError;
    }
  | { readonly kind: 'skipped' };

type Execution = ApplyResult | { readonly kind: 'moved' };

const SKIPPED: ApplyResult = { kind: 'skipped' };

interface DeferredResource {
  readonly item: ReviewItem;
  readonly settings: RunSettings;
}

const FINISHED_RUN_RETENTION = 50;

const emptyCounters = (): MutableCounters => ({
  recordsProcessed: 0,
  recordsCreated: 0,
  recordsUpdated: 0,
  recordsDeleted: 0,
  recordsUnchanged: 0,
  recordsPending: 0,
  recordsFailed: 0,
});

const resourceKey = (resourceType: string, resourceId: string): string =>
  `${resourceType}:${resourceId}`;

const sameVersion = (a: Option<DataRecord>, b: Option<DataRecord>): boolean =>
  O.isNone(a) ? O.isNone(b) : O.isSome(b) && a.value.updatedAt === b.value.updatedAt;

const versionOf = (record: Option<DataRecord>): Timestamp | undefined =>
  pipe(
    record,
    O.map((r) => r.updatedAt),
    O.toUndefined,
  );

// Reviewer values become audit entries; every conflict needs an answer
const manualResolutions = (
  item: ReviewItem,
  decision: ReviewDecision,
  resolvedAt: Timestamp,
): Either<ValidationError, ReadonlyArray<ConflictResolution>> => {
  const missing: ValidationDetail[] = [];
  const justification = `decided by ${decision.reviewer ?? 'reviewer'}${
    decision.note === undefined ? '' : `: ${decision.note}`
  }`;

  const resolutions = item.conflicts.flatMap((conflict): ReadonlyArray<ConflictResolution> => {
    const side = decision.side;
    const finalValue: FieldValue | undefined =
      conflict.field === null
        ? side === undefined
          ? undefined
          : side === 'source'
            ? conflict.sourceValue
            : conflict.targetValue
        : decision.fields?.[conflict.field];
    if (finalValue === undefined) {
      missing.push(
        conflict.field === null
          ? { path: 'side', message: 'record-level conflicts need a side' }
          : { path: `fields.${conflict.field}`, message: 'no value chosen' },
      );
      return [];
    }
    return [
      {
        conflictId: conflict.conflictId,
        resourceId: conflict.resourceId,
        field: conflict.field,
        strategyApplied: 'manual',
        ruleId: 'manual-review',
        sourceValue: conflict.sourceValue,
        targetValue: conflict.targetValue,
        finalValue,
        justification,
        resolvedAt,
      },
    ];
  });

  return missing.length > 0
    ? E.left(
        validationError(`Decision for ${item.resourceType}/${item.resourceId} is incomplete`, missing, {
          resourceId: item.resourceId,
        }),
      )
    : E.right(resolutions);
};

const manualPlan = (
  item: ReviewItem,
  decision: ReviewDecision,
  resolutions: ReadonlyArray<ConflictResolution>,
  target: Option<DataRecord>,
): Plan => {
  const audited = { conflicts: item.conflicts, resolutions };
  const recordLevel = item.conflicts.some((conflict) => conflict.field === null);
  if (recordLevel && decision.side === 'target') {
    return { kind: 'noop', markSynced: O.isSome(target), ...audited };
  }
  if (O.isNone(target)) {
    return item.transformed.deleted === true
      ? { kind: 'noop', markSynced: false, ...audited }
      : { kind: 'upsert', fields: item.transformed.fields, ...audited };
  }
  const chosen = recordLevel ? {} : decision.fields ?? {};
  return writeFor(item.transformed, target.value, audited, chosen);
};

export const createSyncCoordinator = (
  deps: CoordinatorDeps,
  settings: CoordinatorSettings,
): SyncCoordinator => {
  const logger = deps.logger ?? consoleLogger;
  const now = deps.now ?? Date.now;
  const generateId = deps.generateId ?? (() => `sync_${uuidv4()}`);
  const resourceLocks = deps.resourceLocks ?? createKeyedLock();
  const runLocks = createKeyedLock();

  const stateSubject = new Subject<ActiveSync>();
  const eventSubject = new Subject<SyncEvent>();
  const runs = new Map<string, RunContext>();
  const finished: string[] = [];
  const deferred = new Map<string, DeferredResource>();

  const emit = (event: SyncEvent): void => eventSubject.next(event);

  const snapshot = (ctx: RunContext): ActiveSync => ({
    syncId: ctx.syncId,
    providerId: ctx.request.providerId,
    ehrSystem: ctx.request.ehrSystem,
    targetSystem: ctx.request.targetSystem,
    syncType: ctx.request.syncType,
    resourceTypes: ctx.request.resourceTypes,
    status: ctx.status,
    ...ctx.counters,
    errors: [...ctx.errors],
    startedAt: ctx.startedAt,
    updatedAt: ctx.updatedAt,
    ...(ctx.completedAt === undefined ? {} : { completedAt: ctx.completedAt }),
  });

  const publish = (ctx: RunContext): void => {
    ctx.updatedAt = now();
    stateSubject.next(snapshot(ctx));
  };

  const moveTo = (ctx: RunContext, to: SyncStatus): void =>
    pipe(
      transition(ctx.status, to),
      E.match(
        (error) => logError(logger, error, { syncId: ctx.syncId }),
        (status) => {
          const from = ctx.status;
          ctx.status = status;
          emit({ type: 'status-changed', syncId: ctx.syncId, from, to: status, at: now() });
          publish(ctx);
        },
      ),
    );

  // Retry with backoff, each attempt bounded by the record timeout
  const guard = <A>(
    scope: Scope,
    task: TaskEither<SyncError, A>,
    operation: string,
  ): TaskEither<SyncError, A> =>
    retryWithBackoff(
      withTimeout(task, scope.settings.recordTimeoutMs, operation),
      scope.settings.retryPolicy,
      (error, attempt, delayMs) => {
        logger.log('debug', `Retrying ${operation}`, { syncId: scope.syncId, attempt, delayMs, error: error.message });
        emit({ type: 'retry-scheduled', syncId: scope.syncId, operation, attempt, delayMs, at: now() });
      },
    );

  // Writes are aborted on timeout and settle before any retry starts
  const guardWrite = <A>(
    scope: Scope,
    start: (signal: AbortSignal) => TaskEither<SyncError, A>,
    operation: string,
  ): TaskEither<SyncError, A> =>
    retryWithBackoff(
      withAbortTimeout(start, scope.settings.recordTimeoutMs, operation),
      scope.settings.retryPolicy,
      (error, attempt, delayMs) => {
        logger.log('debug', `Retrying ${operation}`, { syncId: scope.syncId, attempt, delayMs, error: error.message });
        emit({ type: 'retry-scheduled', syncId: scope.syncId, operation, attempt, delayMs, at: now() });
      },
    );

  const readTarget = (scope: Scope, resourceType: string, resourceId: string) =>
    guard(scope, deps.target.get(resourceType, resourceId), 'target.get');

  const markSynced = (transformed: TransformedRecord, storedAt: Timestamp): TaskEither<SyncError, void> =>
    deps.ledger.recordApplied(transformed.resourceType, transformed.resourceId, {
      lastSyncAt: Math.max(transformed.updatedAt, storedAt),
      checksum: transformed.checksum,
    });

  const execute = (
    scope: Scope,
    transformed: TransformedRecord,
    current: Option<DataRecord>,
    plan: Plan,
  ): TaskEither<SyncError, Execution> => {
    if (plan.kind === 'defer') {
      return TE.of<SyncError, Execution>({
        kind: 'deferred',
        transformed,
        target: current,
        conflicts: plan.conflicts,
        error: plan.error,
      });
    }
    const audited: Audited = { conflicts: plan.conflicts, resolutions: plan.resolutions };
    const done = (outcome: RecordOutcome): Execution => ({ kind: 'done', outcome, ...audited });

    if (plan.kind === 'noop') {
      return pipe(
        plan.markSynced ? markSynced(transformed, versionOf(current) ?? 0) : TE.of(undefined),
        TE.map(() => done('unchanged')),
      );
    }

    const write: TargetWrite =
      plan.kind === 'delete'
        ? {
            kind: 'delete',
            resourceType: transformed.resourceType,
            resourceId: transformed.resourceId,
            expectedUpdatedAt: versionOf(current),
          }
        : {
            kind: 'upsert',
            resourceType: transformed.resourceType,
            resourceId: transformed.resourceId,
            sourceSystem: transformed.sourceSystem,
            fields: plan.fields,
            mappingVersion: transformed.mappingVersion,
            expectedUpdatedAt: versionOf(current),
          };
    const outcome: RecordOutcome =
      plan.kind === 'delete' ? 'deleted' : O.isNone(current) ? 'created' : 'updated';

    return pipe(
      guardWrite(scope, (signal) => deps.target.apply(write, signal), 'target.apply'),
      TE.chain((applied): TaskEither<SyncError, Execution> =>
        applied.status === 'conflict'
          ? TE.of<SyncError, Execution>({ kind: 'moved' })
          : pipe(
              markSynced(transformed, applied.updatedAt),
              TE.map(() => done(outcome)),
            ),
      ),
    );
  };

  // Read, plan and write until the target holds still
  const settle = (
    scope: Scope,
    transformed: TransformedRecord,
    planFor: (current: Option<DataRecord>) => TaskEither<SyncError, Plan>,
    attempt = 1,
  ): TaskEither<SyncError, ApplyResult> =>
    pipe(
      readTarget(scope, transformed.resourceType, transformed.resourceId),
      TE.chain((current) =>
        pipe(
          planFor(current),
          TE.chain((plan) => execute(scope, transformed, current, plan)),
        ),
      ),
      TE.chain((execution): TaskEither<SyncError, ApplyResult> => {
        if (execution.kind !== 'moved') {
          return TE.of(execution);
        }
        const policy = scope.settings.retryPolicy;
        if (attempt > policy.maxRetries) {
          return TE.left(
            transientIOError(
              `Target kept changing while applying ${transformed.resourceType}/${transformed.resourceId}`,
              'target.apply',
              true,
              { resourceId: transformed.resourceId },
            ),
          );
        }
        const delayMs = calculateBackoff(attempt, policy);
        emit({ type: 'retry-scheduled', syncId: scope.syncId, operation: 'target.apply', attempt, delayMs, at: now() });
        return pipe(
          delay(delayMs),
          TE.chain(() => settle(scope, transformed, planFor, attempt + 1)),
        );
      }),
    );

  const planner: Planner = { detector: deps.detector, resolver: deps.resolver };

  const prepare = (
    ctx: RunContext,
    runTarget: RunTarget,
    transformed: TransformedRecord,
  ): TaskEither<SyncError, Prepared> =>
    pipe(
      TE.Do,
      TE.bind('current', () => readTarget(ctx, transformed.resourceType, transformed.resourceId)),
      TE.bind('point', () => deps.ledger.getResource(transformed.resourceType, transformed.resourceId)),
      TE.map(({ current, point }) => ({
        transformed,
        current,
        plan: planRecord(transformed, current, point, runTarget, planner),
      })),
    );

  const applyPrepared = (
    ctx: RunContext,
    runTarget: RunTarget,
    prepared: Prepared,
  ): TaskEither<SyncError, ApplyResult> => {
    const { transformed } = prepared;
    const planFor = (current: Option<DataRecord>): TaskEither<SyncError, Plan> =>
      sameVersion(current, prepared.current)
        ? TE.of(prepared.plan)
        : pipe(
            deps.ledger.getResource(transformed.resourceType, transformed.resourceId),
            TE.map((point) => planRecord(transformed, current, point, runTarget, planner)),
          );
    return resourceLocks.run(
      resourceKey(transformed.resourceType, transformed.resourceId),
      settle(ctx, transformed, planFor),
    );
  };

  // Retryable extraction failures get one more chance through refetch
  const recover = (ctx: RunContext, resourceType: string, item: ExtractionItem): Task<Slot<DataRecord>> => {
    if (E.isRight(item)) {
      return T.of({ resourceId: item.right.resourceId, result: item });
    }
    const resourceId = item.left.context?.resourceId;
    const refetch = deps.extraction.refetch;
    if (resourceId === undefined || refetch === undefined || !isRetryable(item.left)) {
      return T.of({ resourceId, result: item });
    }
    return pipe(
      guard(ctx, refetch(resourceType, resourceId), 'extract.refetch'),
      T.map((result) => ({ resourceId, result })),
    );
  };

  const holdBack = (ctx: RunContext, resourceType: string, updatedAt: Timestamp | undefined): void => {
    const held = ctx.heldBack.get(resourceType);
    if (held === null) {
      return;
    }
    ctx.heldBack.set(
      resourceType,
      updatedAt === undefined ? null : held === undefined ? updatedAt : Math.min(held, updatedAt),
    );
  };

  const recordFailure = (
    ctx: RunContext,
    resourceType: string,
    resourceId: string | undefined,
    updatedAt: Timestamp | undefined,
    error: SyncError,
  ): void => {
    holdBack(ctx, resourceType, updatedAt);
    const entry = toErrorEntry(error);
    const withId = entry.resourceId === undefined && resourceId !== undefined ? { ...entry, resourceId } : entry;
    ctx.counters.recordsProcessed++;
    ctx.counters.recordsFailed++;
    ctx.errors.push(withId);
    if (isRetryable(error)) {
      logger.log('warn', `Retries exhausted for ${resourceType}/${resourceId ?? '?'}`, {
        syncId: ctx.syncId,
        error: error.message,
      });
    }
    emit({ type: 'record-failed', syncId: ctx.syncId, resourceType, error: withId, at: now() });
  };

  const deferResource = async (
    ctx: RunContext,
    resourceType: string,
    result: Extract<ApplyResult, { kind: 'deferred' }>,
  ): Promise<void> => {
    const { transformed } = result;
    const item: ReviewItem = {
      syncId: ctx.syncId,
      resourceType,
      resourceId: transformed.resourceId,
      conflicts: result.conflicts,
      transformed,
      target: O.toUndefined(result.target),
      reason: result.error.message,
      submittedAt: now(),
    };
    const submitted = await guard(ctx, deps.reviewQueue.submit(item), 'review.submit')();
    if (E.isLeft(submitted)) {
      recordFailure(ctx, resourceType, transformed.resourceId, transformed.updatedAt, submitted.left);
      return;
    }
    deferred.set(resourceKey(resourceType, transformed.resourceId), { item, settings: ctx.settings });
    ctx.counters.recordsProcessed++;
    ctx.counters.recordsPending++;
    ctx.pending.push(transformed.resourceId);
    ctx.conflicts.push(...result.conflicts);
    ctx.errors.push(toErrorEntry(result.error));
    logger.log('info', `Deferred ${resourceType}/${transformed.resourceId} to manual review`, {
      syncId: ctx.syncId,
      conflicts: result.conflicts.length,
    });
    emit({
      type: 'record-deferred',
      syncId: ctx.syncId,
      resourceType,
      resourceId: transformed.resourceId,
      conflicts: result.conflicts.length,
      at: now(),
    });
  };

  const tally = async (
    ctx: RunContext,
    resourceType: string,
    slots: ReadonlyArray<Slot<ApplyResult>>,
    updatedAtOf: ReadonlyMap<string, Timestamp>,
  ): Promise<void> => {
    for (const slot of slots) {
      const result = slot.result;
      if (E.isLeft(result)) {
        const updatedAt = slot.resourceId === undefined ? undefined : updatedAtOf.get(slot.resourceId);
        recordFailure(ctx, resourceType, slot.resourceId, updatedAt, result.left);
        continue;
      }
      const applied = result.right;
      if (applied.kind === 'deferred') {
        await deferResource(ctx, resourceType, applied);
      } else if (applied.kind === 'done') {
        ctx.counters.recordsProcessed++;
        switch (applied.outcome) {
          case 'created':
            ctx.counters.recordsCreated++;
            break;
          case 'updated':
            ctx.counters.recordsUpdated++;
            break;
          case 'deleted':
            ctx.counters.recordsDeleted++;
            break;
          case 'unchanged':
            ctx.counters.recordsUnchanged++;
            break;
        }
        ctx.conflicts.push(...applied.conflicts);
        ctx.resolutions.push(...applied.resolutions);
        emit({
          type: 'record-settled',
          syncId: ctx.syncId,
          resourceType,
          resourceId: slot.resourceId ?? '',
          outcome: applied.outcome,
          at: now(),
        });
      }
    }
  };

  const processBatch = async (
    ctx: RunContext,
    runTarget: RunTarget,
    items: ReadonlyArray<ExtractionItem>,
    admit: (record: DataRecord) => boolean,
  ): Promise<void> => {
    const workers = ctx.settings.batchSize;
    const recovered = await mapWithConcurrency(items, workers, (item) =>
      recover(ctx, runTarget.resourceType, item),
    )();
    const admitted = recovered.filter((slot) => E.isLeft(slot.result) || admit(slot.result.right));
    const updatedAtOf = new Map(
      recovered.flatMap((slot): ReadonlyArray<readonly [string, Timestamp]> =>
        E.isRight(slot.result) ? [[slot.result.right.resourceId, slot.result.right.updatedAt]] : [],
      ),
    );

    moveTo(ctx, 'transforming');
    const transformed = admitted.map(
      (slot): Slot<TransformedRecord> => ({
        resourceId: slot.resourceId,
        result: pipe(
          slot.result,
          E.chainW((record) =>
            pipe(
              E.tryCatch(() => deps.transformer.transform(record, runTarget.mapping), toSyncError),
              E.chainW((result) => result),
            ),
          ),
        ),
      }),
    );
    for (const slot of transformed) {
      if (E.isRight(slot.result)) {
        const record = slot.result.right;
        ctx.warnings.push(
          ...record.warnings.map((warning) => ({ ...warning, resourceId: record.resourceId })),
        );
      }
    }

    moveTo(ctx, 'resolving');
    const prepared = await mapWithConcurrency(transformed, workers, (slot): Task<Slot<Prepared>> =>
      E.isLeft(slot.result)
        ? T.of({ resourceId: slot.resourceId, result: E.left(slot.result.left) })
        : pipe(
            prepare(ctx, runTarget, slot.result.right),
            T.map((result) => ({ resourceId: slot.resourceId, result })),
          ),
    )();

    moveTo(ctx, 'applying');
    const applied = await mapWithConcurrency(prepared, workers, (slot): Task<Slot<ApplyResult>> => {
      if (E.isLeft(slot.result)) {
        return T.of({ resourceId: slot.resourceId, result: E.left(slot.result.left) });
      }
      if (ctx.cancelRequested) {
        return T.of({ resourceId: slot.resourceId, result: E.right(SKIPPED) });
      }
      return pipe(
        applyPrepared(ctx, runTarget, slot.result.right),
        T.map((result) => ({ resourceId: slot.resourceId, result })),
      );
    })();

    await tally(ctx, runTarget.resourceType, applied, updatedAtOf);
    publish(ctx);
  };

  const lastRunTime = async (ctx: RunContext, resourceType: string): Promise<Timestamp | undefined> => {
    if (ctx.request.syncType !== 'incremental') {
      return undefined;
    }
    const scope = { providerId: ctx.request.providerId, ehrSystem: ctx.request.ehrSystem, resourceType };
    const lastRun = await deps.ledger.getLastRun(scope)();
    if (E.isLeft(lastRun)) {
      logError(logger, lastRun.left, { syncId: ctx.syncId, fallback: 'full extraction' });
      return undefined;
    }
    return O.toUndefined(lastRun.right);
  };

  const syncResourceType = async (ctx: RunContext, runTarget: RunTarget): Promise<RunEnd | undefined> => {
    const { resourceType } = runTarget;
    const since = await lastRunTime(ctx, resourceType);
    if (since !== undefined) {
      ctx.since.set(resourceType, since);
    }
    const filters = activeFilters(ctx.request.filters ?? []);
    const keep = createRecordFilter(filters);
    const admit = (record: DataRecord): boolean =>
      record.resourceType === resourceType &&
      (since === undefined || record.updatedAt > since) &&
      keep(record);

    const batches = pullBatches(
      deps.extraction.extract(resourceType, { since, filters }),
      ctx.settings.batchSize,
    );
    const pull = TE.tryCatch(
      () => batches.next(),
      (error) =>
        fatalRunError(
          `Extraction of ${resourceType} failed: ${toSyncError(error).message}`,
          'extraction-failed',
          { resourceType },
        ),
    );

    const loop = async (batch: number): Promise<RunEnd | undefined> => {
      if (ctx.cancelRequested) {
        return { status: 'cancelled' };
      }
      const next = await pull();
      if (E.isLeft(next)) {
        return { status: 'failed', error: next.left };
      }
      const step = next.right;
      if (step.done === true) {
        return undefined;
      }

      await processBatch(ctx, runTarget, step.value, admit);
      const { recordsProcessed, recordsFailed } = ctx.counters;
      emit({
        type: 'batch-completed',
        syncId: ctx.syncId,
        resourceType,
        batch,
        recordsProcessed,
        recordsFailed,
        at: now(),
      });

      if (recordsProcessed > 0 && recordsFailed / recordsProcessed > ctx.settings.abortThreshold) {
        return {
          status: 'failed',
          error: fatalRunError(
            `Failure rate ${recordsFailed}/${recordsProcessed} exceeds abort threshold ${ctx.settings.abortThreshold}`,
            'abort-threshold',
            { resourceType },
          ),
        };
      }
      moveTo(ctx, 'extracting');
      return loop(batch + 1);
    };

    const end = await loop(1);
    const closed = await TE.tryCatch(() => batches.return(undefined), toSyncError)();
    if (E.isLeft(closed)) {
      logError(logger, closed.left, { syncId: ctx.syncId, resourceType });
    }
    return end;
  };

  const resolveTargets = (request: SynchronizationData): Either<FatalRunError, ReadonlyArray<RunTarget>> => {
    const problems: string[] = [];
    const targets: RunTarget[] = [];
    const pair = { sourceSystem: request.ehrSystem, targetSystem: request.targetSystem };

    for (const resourceType of request.resourceTypes) {
      const mapping = deps.catalog.getActive(pair, resourceType);
      const strategy = selectStrategy(
        settings.strategies,
        settings.defaultStrategy,
        request.providerId,
        request.ehrSystem,
        resourceType,
      );
      if (O.isNone(mapping)) {
        problems.push(`no active mapping for ${resourceType} (${request.ehrSystem} -> ${request.targetSystem})`);
      }
      if (O.isNone(strategy)) {
        problems.push(`no resolution strategy for ${resourceType}`);
      }
      if (O.isSome(mapping) && O.isSome(strategy)) {
        targets.push({ resourceType, mapping: mapping.value, strategy: strategy.value });
      }
    }

    return problems.length > 0
      ? E.left(fatalRunError(`Missing configuration: ${problems.join('; ')}`, 'missing-configuration'))
      : E.right(targets);
  };

  const retire = (ctx: RunContext): void => {
    finished.push(ctx.syncId);
    if (finished.length > FINISHED_RUN_RETENTION) {
      const oldest = finished.shift();
      if (oldest !== undefined) {
        runs.delete(oldest);
      }
    }
  };

  // Next incremental run starts before the earliest failed record so it is pulled again
  const resumePoint = (ctx: RunContext, resourceType: string): Timestamp | undefined => {
    const held = ctx.heldBack.get(resourceType);
    if (held === undefined) {
      return ctx.startedAt;
    }
    return held === null ? ctx.since.get(resourceType) : Math.min(ctx.startedAt, held - 1);
  };

  const finish = async (ctx: RunContext, end: RunEnd): Promise<void> => {
    if (end.status === 'failed') {
      ctx.errors.push(toErrorEntry(end.error));
      logError(logger, end.error, { syncId: ctx.syncId });
    }
    ctx.completedAt = now();
    moveTo(ctx, end.status);

    if (end.status === 'completed') {
      const recorded = await mapWithConcurrency(ctx.request.resourceTypes, 1, (resourceType) => {
        const point = resumePoint(ctx, resourceType);
        return point === undefined
          ? TE.of<SyncError, void>(undefined)
          : deps.ledger.recordRun(
              { providerId: ctx.request.providerId, ehrSystem: ctx.request.ehrSystem, resourceType },
              point,
            );
      })();
      recorded.forEach((result) => {
        if (E.isLeft(result)) {
          logError(logger, result.left, { syncId: ctx.syncId });
        }
      });
    }

    logger.log('info', `Sync ${ctx.syncId} ${ctx.status}`, { ...ctx.counters });
    retire(ctx);
  };

  const drive = async (ctx: RunContext): Promise<void> => {
    if (ctx.cancelRequested) {
      return finish(ctx, { status: 'cancelled' });
    }
    const targets = resolveTargets(ctx.request);
    if (E.isLeft(targets)) {
      return finish(ctx, { status: 'failed', error: targets.left });
    }

    logger.log('info', `Sync ${ctx.syncId} started`, {
      providerId: ctx.request.providerId,
      ehrSystem: ctx.request.ehrSystem,
      syncType: ctx.request.syncType,
      resourceTypes: ctx.request.resourceTypes,
    });
    moveTo(ctx, 'extracting');

    for (const runTarget of targets.right) {
      const end = await syncResourceType(ctx, runTarget);
      if (end !== undefined) {
        return finish(ctx, end);
      }
    }
    return finish(ctx, { status: 'completed' });
  };

  const toResult = (ctx: RunContext): SynchronizationResult => ({
    syncId: ctx.syncId,
    status: ctx.status,
    success: ctx.status === 'completed' && ctx.counters.recordsFailed === 0,
    ...ctx.counters,
    conflicts: [...ctx.conflicts],
    resolutions: [...ctx.resolutions],
    pendingResourceIds: [...ctx.pending],
    errors: [...ctx.errors],
    warnings: [...ctx.warnings],
    duration: (ctx.completedAt ?? now()) - ctx.startedAt,
  });

  const startSync: SyncCoordinator['startSync'] = (request) =>
    pipe(
      TE.fromEither(validate(SynchronizationDataCodec, 'SynchronizationData')(request)),
      TE.chainTaskK(() => {
        const startedAt = now();
        const ctx: RunContext = {
          syncId: generateId(),
          request,
          settings: runSettings(settings, request.options),
          startedAt,
          counters: emptyCounters(),
          errors: [],
          warnings: [],
          conflicts: [],
          resolutions: [],
          pending: [],
          heldBack: new Map(),
          since: new Map(),
          status: 'queued',
          updatedAt: startedAt,
          cancelRequested: false,
        };
        runs.set(ctx.syncId, ctx);
        publish(ctx);

        return pipe(
          runLocks.run(`${request.providerId}:${request.ehrSystem}`, () => drive(ctx)),
          T.map(() => toResult(ctx)),
        );
      }),
    );

  const cancelSync: SyncCoordinator['cancelSync'] = (syncId) => {
    const ctx = runs.get(syncId);
    if (ctx === undefined || isTerminal(ctx.status)) {
      return false;
    }
    ctx.cancelRequested = true;
    logger.log('info', `Cancellation requested for sync ${syncId}`, { status: ctx.status });
    return true;
  };

  const getActiveSync: SyncCoordinator['getActiveSync'] = (syncId) =>
    pipe(O.fromNullable(runs.get(syncId)), O.map(snapshot));

  const applyManualResolution: SyncCoordinator['applyManualResolution'] = (decision) => {
    const key = resourceKey(decision.resourceType, decision.resourceId);
    const waiting = deferred.get(key);
    if (waiting === undefined) {
      return TE.left(
        validationError(`${decision.resourceType}/${decision.resourceId} is not awaiting review`, [
          { path: 'resourceId', message: 'no deferred resource with this id' },
        ]),
      );
    }
    const { item } = waiting;
    const scope: Scope = { syncId: item.syncId, settings: waiting.settings };

    return pipe(
      TE.fromEither(manualResolutions(item, decision, now())),
      TE.chain((resolutions) =>
        resourceLocks.run(
          key,
          settle(scope, item.transformed, (current) =>
            TE.of(manualPlan(item, decision, resolutions, current)),
          ),
        ),
      ),
      TE.chain((applied): TaskEither<SyncError, ManualResolutionResult> => {
        if (applied.kind !== 'done') {
          return TE.left(
            transientIOError(`Manual resolution of ${key} did not settle`, 'target.apply', false, {
              resourceId: decision.resourceId,
            }),
          );
        }
        deferred.delete(key);
        emit({
          type: 'manual-resolution-applied',
          resourceType: decision.resourceType,
          resourceId: decision.resourceId,
          outcome: applied.outcome,
          at: now(),
        });
        logger.log('info', `Applied manual resolution for ${key}`, { outcome: applied.outcome });
        return TE.of({
          resourceType: decision.resourceType,
          resourceId: decision.resourceId,
          outcome: applied.outcome,
          resolutions: applied.resolutions,
        });
      }),
    );
  };

  // Decisions arriving from the review queue are applied as they come
  const decisions = deps.reviewQueue.decisions$
    ?.pipe(mergeMap((decision) => applyManualResolution(decision)()))
    .subscribe((result) => {
      if (E.isLeft(result)) {
        logError(logger, result.left, { operation: 'applyManualResolution' });
      }
    });

  return {
    startSync,
    cancelSync,
    getActiveSync,
    applyManualResolution,
    state$: stateSubject.asObservable(),
    events$: eventSubject.asObservable(),
    dispose: () => {
      decisions?.unsubscribe();
      stateSubject.complete();
      eventSubject.complete();
    },
  };
};
