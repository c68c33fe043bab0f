/**
 * EHR sync engine
 *
 * Wires the catalog, transformation, conflict handling, coordinator and
 * auditor behind the operations callers use.
 */

import { pipe } from 'fp-ts/function';
import * as A from 'fp-ts/ReadonlyArray';
import * as E from 'fp-ts/Either';
import * as TE from 'fp-ts/TaskEither';
import type { Either } from 'fp-ts/Either';
import type { Option } from 'fp-ts/Option';
import type { TaskEither } from 'fp-ts/TaskEither';
import type {
  ActiveSync,
  ConflictData,
  ConflictResolutionResult,
  ConsistencyData,
  ConsistencyResult,
  DataRecord,
  EngineConfig,
  SchemaMappingInput,
  Stream,
  SynchronizationData,
  SynchronizationResult,
  Timestamp,
} from './types';
import type { SyncError, ValidationError } from './types/errors';
import { fatalRunError, validationError } from './types/errors';
import { ConflictDataCodec, validate } from './types/schemas';
import type { Logger } from './errors/handler';
import { consoleLogger } from './errors/handler';
import { defaultEngineConfig, validateEngineConfig } from './config/defaults';
import type { SchemaCatalog } from './catalog/schema-catalog';
import { createSchemaCatalog } from './catalog/schema-catalog';
import type { MappingReport } from './catalog/mapping-validator';
import { validateMapping } from './catalog/mapping-validator';
import type { TransformRegistry } from './transform/coercion';
import { createTransformationEngine } from './transform/engine';
import { createConflictDetector } from './sync/conflict-detector';
import type { CustomResolverRegistry } from './sync/conflict-resolver';
import { createConflictResolver } from './sync/conflict-resolver';
import type { MergeRegistry } from './sync/merge';
import type { ManualResolutionResult, SyncEvent } from './sync/coordinator';
import { createSyncCoordinator } from './sync/coordinator';
import { createConsistencyAuditor } from './audit/consistency-auditor';
import type { ExtractionAdapter } from './adapters/extraction';
import type { TargetStore } from './adapters/target-store';
import type { ReviewDecision, ReviewQueue } from './adapters/review-queue';
import { createMemoryReviewQueue } from './adapters/review-queue';
import type { SamplingSource } from './adapters/sampling';
import type { SyncLedger } from './core/sync-ledger';
import { createSyncLedger } from './core/sync-ledger';

export interface EhrSyncEngineDeps {
  readonly extraction: ExtractionAdapter;
  readonly target: TargetStore;
  readonly reviewQueue?: ReviewQueue;
  readonly sampling?: SamplingSource;
  readonly ledger?: SyncLedger;
  readonly transforms?: TransformRegistry;
  readonly merges?: MergeRegistry;
  readonly customResolvers?: CustomResolverRegistry;
  readonly logger?: Logger;
  readonly now?: () => Timestamp;
  readonly generateId?: () => string;
}

export interface EhrSyncEngine {
  readonly catalog: SchemaCatalog;
  readonly validateMapping: (
    input: SchemaMappingInput,
    samples?: ReadonlyArray<DataRecord>,
  ) => Either<ValidationError, MappingReport>;
  readonly startSync: (request: SynchronizationData) => TaskEither<ValidationError, SynchronizationResult>;
  readonly resolveConflicts: (data: ConflictData) => Either<ValidationError, ConflictResolutionResult>;
  readonly checkConsistency: (data: ConsistencyData) => TaskEither<SyncError, ConsistencyResult>;
  readonly applyManualResolution: (decision: ReviewDecision) => TaskEither<SyncError, ManualResolutionResult>;
  readonly cancelSync: (syncId: string) => boolean;
  readonly getActiveSync: (syncId: string) => Option<ActiveSync>;
  readonly state$: Stream<ActiveSync>;
  readonly events$: Stream<SyncEvent>;
  readonly dispose: () => void;
}

/**
 * Create an engine from validated configuration.
 * Every configured mapping is checked, then registered and activated in order.
 */
export const createEhrSyncEngine = (
  deps: EhrSyncEngineDeps,
  config: EngineConfig = defaultEngineConfig,
): Either<ValidationError, EhrSyncEngine> => {
  const logger = deps.logger ?? consoleLogger;
  const now = deps.now ?? Date.now;
  const catalog = createSchemaCatalog(now);

  const checkMapping = (
    input: SchemaMappingInput,
    samples?: ReadonlyArray<DataRecord>,
  ): Either<ValidationError, MappingReport> =>
    validateMapping(input, { transforms: deps.transforms, merges: deps.merges, samples });

  // Error-level issues keep a mapping out of the catalog
  const admitMapping = (input: SchemaMappingInput): Either<ValidationError, SchemaMappingInput> =>
    pipe(
      checkMapping(input),
      E.chain((report): Either<ValidationError, SchemaMappingInput> =>
        report.valid
          ? E.right(input)
          : E.left(
              validationError(
                `Schema mapping for ${input.resourceType} (${input.sourceSystem} -> ${input.targetSystem}) failed validation`,
                report.issues
                  .filter((issue) => issue.severity === 'error')
                  .map((issue) => ({ path: issue.path, message: issue.message })),
              ),
            ),
      ),
    );

  return pipe(
    validateEngineConfig(config),
    E.chainFirst((valid) =>
      pipe(
        valid.mappings,
        A.traverse(E.Applicative)((mapping) =>
          pipe(
            admitMapping(mapping),
            E.chain((admitted) => catalog.register(admitted)),
          ),
        ),
      ),
    ),
    E.map((valid) => {
      const detector = createConflictDetector({ clockSkewToleranceMs: valid.clockSkewToleranceMs, now });
      const resolver = createConflictResolver({
        merges: deps.merges,
        customResolvers: deps.customResolvers,
        now,
      });
      const coordinator = createSyncCoordinator(
        {
          catalog,
          transformer: createTransformationEngine(deps.transforms),
          detector,
          resolver,
          extraction: deps.extraction,
          target: deps.target,
          reviewQueue: deps.reviewQueue ?? createMemoryReviewQueue(),
          ledger: deps.ledger ?? createSyncLedger(),
          logger,
          now,
          generateId: deps.generateId,
        },
        valid,
      );
      const sampling = deps.sampling;
      const auditor =
        sampling === undefined
          ? undefined
          : createConsistencyAuditor({ sampling, policy: valid.sampling, logger, now });

      const resolveConflicts = (data: ConflictData): Either<ValidationError, ConflictResolutionResult> =>
        pipe(
          validate(ConflictDataCodec, 'ConflictData')(data),
          E.map(() => resolver.resolve(data.conflicts, data.strategy)),
        );

      const checkConsistency = (data: ConsistencyData): TaskEither<SyncError, ConsistencyResult> =>
        auditor === undefined
          ? TE.left(fatalRunError('No sampling source configured for consistency checks', 'missing-configuration'))
          : auditor.checkConsistency(data);

      logger.log('info', 'EHR sync engine ready', { mappings: valid.mappings.length });

      return {
        catalog,
        validateMapping: checkMapping,
        startSync: coordinator.startSync,
        resolveConflicts,
        checkConsistency,
        applyManualResolution: coordinator.applyManualResolution,
        cancelSync: coordinator.cancelSync,
        getActiveSync: coordinator.getActiveSync,
        state$: coordinator.state$,
        events$: coordinator.events$,
        dispose: coordinator.dispose,
      };
    }),
  );
};
