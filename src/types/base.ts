/**
 * Base types for the EHR sync engine
 */

import type { Observable } from 'rxjs';

// Utility types
export type ReadonlyRecord<K extends string | number | symbol, V> = Readonly<Record<K, V>>;

// Timestamp type (Unix milliseconds)
export type Timestamp = number;

// Field values are JSON-like
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | ReadonlyArray<FieldValue>
  | { readonly [key: string]: FieldValue };

export type FieldMap = ReadonlyRecord<string, FieldValue>;

export type EhrSystem =
  | 'epic'
  | 'cerner'
  | 'meditech'
  | 'allscripts'
  | 'athena'
  | 'eclinicalworks'
  | 'nextgen'
  | 'practicefusion'
  | 'kareo'
  | 'drchrono';

export type FieldType =
  | 'string'
  | 'integer'
  | 'decimal'
  | 'boolean'
  | 'date'
  | 'datetime'
  | 'code'
  | 'list'
  | 'object';

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export type FieldImportance = 'medium' | 'low';

// Schema mapping
export interface FieldMapping {
  readonly sourceField: string;
  readonly targetField: string;
  readonly sourceType: FieldType;
  readonly targetType: FieldType;
  readonly transform?: string;
  readonly required: boolean;
  readonly defaultValue?: FieldValue;
  readonly clinicallySignificant?: boolean;
  readonly importance?: FieldImportance;
  readonly merge?: string;
}

export type FieldValidation =
  | {
      readonly type: 'range';
      readonly field: string;
      readonly min?: number;
      readonly max?: number;
      readonly severity: Severity;
    }
  | {
      readonly type: 'length';
      readonly field: string;
      readonly min?: number;
      readonly max?: number;
      readonly severity: Severity;
    }
  | {
      readonly type: 'pattern';
      readonly field: string;
      readonly pattern: string;
      readonly severity: Severity;
    };

export interface SystemPair {
  readonly sourceSystem: string;
  readonly targetSystem: string;
}

export interface SchemaMappingInput extends SystemPair {
  readonly resourceType: string;
  readonly fieldMappings: ReadonlyArray<FieldMapping>;
  readonly validations?: ReadonlyArray<FieldValidation>;
}

export interface SchemaMapping extends SchemaMappingInput {
  readonly version: number;
  readonly validations: ReadonlyArray<FieldValidation>;
  readonly createdAt: Timestamp;
}

// Records
export interface DataRecord {
  readonly resourceType: string;
  readonly resourceId: string;
  readonly sourceSystem: string;
  readonly fields: FieldMap;
  readonly updatedAt: Timestamp;
  readonly mappingVersion?: number;
  readonly deleted?: boolean;
  readonly readOnly?: boolean;
}

export interface TransformWarning {
  readonly code: 'defaulted' | 'validation-failed';
  readonly field: string;
  readonly message: string;
  readonly severity: Severity;
}

export interface TransformedRecord extends DataRecord {
  readonly targetSystem: string;
  readonly mappingVersion: number;
  readonly warnings: ReadonlyArray<TransformWarning>;
  readonly checksum: string;
}

// Conflicts
export type ConflictType = 'data' | 'schema' | 'version' | 'access' | 'timing';

export interface DataConflict {
  readonly conflictId: string;
  readonly resourceType: string;
  readonly resourceId: string;
  readonly field: string | null;
  readonly conflictType: ConflictType;
  readonly sourceValue: FieldValue;
  readonly targetValue: FieldValue;
  readonly sourceUpdatedAt: Timestamp;
  readonly targetUpdatedAt: Timestamp;
  readonly sourceSystem: string;
  readonly targetSystem: string;
  readonly severity: Severity;
  readonly merge?: string;
  readonly detectedAt: Timestamp;
}

// Resolution strategies
export type StrategyName =
  | 'sourceWins'
  | 'targetWins'
  | 'timestamp'
  | 'priority'
  | 'merge'
  | 'manual'
  | 'custom';

export interface ResolutionRule {
  readonly ruleId: string;
  readonly priority: number;
  readonly strategy: StrategyName;
  readonly fields?: ReadonlyArray<string>;
  readonly conflictTypes?: ReadonlyArray<ConflictType>;
  readonly severities?: ReadonlyArray<Severity>;
}

export interface ResolutionStrategy {
  readonly name: StrategyName;
  readonly rules: ReadonlyArray<ResolutionRule>;
  readonly systemPriority?: ReadonlyRecord<string, number>;
  readonly customResolver?: string;
}

// Audit entry
export interface ConflictResolution {
  readonly conflictId: string;
  readonly resourceId: string;
  readonly field: string | null;
  readonly strategyApplied: StrategyName;
  readonly ruleId: string;
  readonly sourceValue: FieldValue;
  readonly targetValue: FieldValue;
  readonly finalValue: FieldValue;
  readonly justification: string;
  readonly resolvedAt: Timestamp;
}

// Retry policy
export interface RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelay: number;
  readonly backoffMultiplier: number;
  readonly maxDelay: number;
}

// Sync filters
export type FilterOperator =
  | 'equals'
  | 'notEquals'
  | 'greaterThan'
  | 'lessThan'
  | 'contains'
  | 'notContains'
  | 'startsWith'
  | 'endsWith';

export interface SyncFilter {
  readonly field: string;
  readonly operator: FilterOperator;
  readonly value: string | number | boolean;
  readonly isActive?: boolean;
}

export interface ExtractionFilter {
  readonly since?: Timestamp;
  readonly filters: ReadonlyArray<SyncFilter>;
}

export type SyncType = 'full' | 'incremental';

// Run state
export type SyncStatus =
  | 'queued'
  | 'extracting'
  | 'transforming'
  | 'resolving'
  | 'applying'
  | 'completed'
  | 'failed'
  | 'cancelled';

export interface SyncErrorEntry {
  readonly code: string;
  readonly message: string;
  readonly resourceId?: string;
  readonly field?: string;
  readonly retryable: boolean;
  readonly timestamp: Timestamp;
}

export interface SyncWarningEntry {
  readonly code: string;
  readonly message: string;
  readonly resourceId: string;
  readonly field: string;
  readonly severity: Severity;
}

export interface SyncCounters {
  readonly recordsProcessed: number;
  readonly recordsCreated: number;
  readonly recordsUpdated: number;
  readonly recordsDeleted: number;
  readonly recordsUnchanged: number;
  readonly recordsPending: number;
  readonly recordsFailed: number;
}

export interface ActiveSync extends SyncCounters {
  readonly syncId: string;
  readonly providerId: string;
  readonly ehrSystem: EhrSystem;
  readonly targetSystem: string;
  readonly syncType: SyncType;
  readonly resourceTypes: ReadonlyArray<string>;
  readonly status: SyncStatus;
  readonly errors: ReadonlyArray<SyncErrorEntry>;
  readonly startedAt: Timestamp;
  readonly updatedAt: Timestamp;
  readonly completedAt?: Timestamp;
}

// Requests
export interface SyncRunOptions {
  readonly batchSize?: number;
  readonly abortThreshold?: number;
  readonly recordTimeoutMs?: number;
  readonly retryPolicy?: RetryPolicy;
}

export interface SynchronizationData {
  readonly providerId: string;
  readonly ehrSystem: EhrSystem;
  readonly targetSystem: string;
  readonly syncType: SyncType;
  readonly resourceTypes: ReadonlyArray<string>;
  readonly filters?: ReadonlyArray<SyncFilter>;
  readonly options?: SyncRunOptions;
}

export interface ConflictData {
  readonly conflicts: ReadonlyArray<DataConflict>;
  readonly strategy: ResolutionStrategy;
}

// Results
export interface SynchronizationResult extends SyncCounters {
  readonly syncId: string;
  readonly status: SyncStatus;
  readonly success: boolean;
  readonly conflicts: ReadonlyArray<DataConflict>;
  readonly resolutions: ReadonlyArray<ConflictResolution>;
  readonly pendingResourceIds: ReadonlyArray<string>;
  readonly errors: ReadonlyArray<SyncErrorEntry>;
  readonly warnings: ReadonlyArray<SyncWarningEntry>;
  readonly duration: number;
}

export interface ConflictPatternSummary {
  readonly field: string | null;
  readonly conflictType: ConflictType;
  readonly count: number;
}

export interface ConflictResolutionResult {
  readonly success: boolean;
  readonly conflictsResolved: number;
  readonly conflictsRemaining: number;
  readonly strategyUsed: StrategyName;
  readonly resolutions: ReadonlyArray<ConflictResolution>;
  readonly pendingResourceIds: ReadonlyArray<string>;
  readonly patterns: ReadonlyArray<ConflictPatternSummary>;
  readonly errors: ReadonlyArray<SyncErrorEntry>;
}

// Consistency auditing
export interface TimeRange {
  readonly start: Timestamp;
  readonly end: Timestamp;
}

export interface DataSourceRef {
  readonly sourceId: string;
  readonly system: string;
  readonly resourceType: string;
  readonly sampleSize?: number;
}

export interface DataSample {
  readonly sampleId: string;
  readonly sourceId: string;
  readonly system: string;
  readonly resourceType: string;
  readonly resourceId: string;
  readonly fields: FieldMap;
  readonly sampledAt: Timestamp;
}

interface RuleBase {
  readonly ruleId: string;
  readonly name: string;
  readonly severity: Severity;
  readonly resourceType?: string;
  readonly remediation?: string;
}

export type ConsistencyRule =
  | (RuleBase & {
      readonly kind: 'type-match';
      readonly field: string;
      readonly expectedType: FieldType;
      readonly required?: boolean;
    })
  | (RuleBase & {
      readonly kind: 'referential-integrity';
      readonly field: string;
      readonly referencedResourceType: string;
    })
  | (RuleBase & {
      readonly kind: 'business-rule';
      readonly condition: SyncFilter;
    })
  | (RuleBase & {
      readonly kind: 'cross-source-match';
      readonly field: string;
    });

export interface ConsistencyCheckOptions {
  readonly validateDataTypes?: boolean;
  readonly checkReferentialIntegrity?: boolean;
  readonly validateBusinessRules?: boolean;
  readonly checkCrossSource?: boolean;
}

export interface ConsistencyData {
  readonly sources: ReadonlyArray<DataSourceRef>;
  readonly rules: ReadonlyArray<ConsistencyRule>;
  readonly timeRange?: TimeRange;
  readonly sampleSize?: number;
  readonly severityThreshold?: Severity;
  readonly options?: ConsistencyCheckOptions;
}

export type IssueType = 'dataType' | 'referentialIntegrity' | 'businessRule' | 'crossSource';

export interface ConsistencyIssue {
  readonly issueId: string;
  readonly ruleId: string;
  readonly ruleName: string;
  readonly type: IssueType;
  readonly severity: Severity;
  readonly sourceId: string;
  readonly resourceId: string;
  readonly description: string;
  readonly remediation: string;
}

export type RecommendationType =
  | 'dataCorrection'
  | 'schemaUpdate'
  | 'ruleModification'
  | 'processImprovement';

export interface ConsistencyRecommendation {
  readonly ruleId: string;
  readonly type: RecommendationType;
  readonly description: string;
  readonly priority: Severity;
  readonly affectedRecords: number;
}

export interface ConsistencyResult {
  readonly success: boolean;
  readonly score: number;
  readonly checksRun: number;
  readonly checksPassed: number;
  readonly samplesChecked: number;
  readonly issues: ReadonlyArray<ConsistencyIssue>;
  readonly recommendations: ReadonlyArray<ConsistencyRecommendation>;
  readonly checkedAt: Timestamp;
}

// Engine configuration
export interface StrategyBinding {
  readonly providerId?: string;
  readonly ehrSystem?: string;
  readonly resourceType?: string;
  readonly strategy: ResolutionStrategy;
}

export interface SamplingPolicy {
  readonly sampleSize: number;
  readonly severityThreshold: Severity;
}

export interface EngineConfig {
  readonly mappings: ReadonlyArray<SchemaMappingInput>;
  readonly strategies: ReadonlyArray<StrategyBinding>;
  readonly defaultStrategy?: ResolutionStrategy;
  readonly retryPolicy: RetryPolicy;
  readonly batchSize: number;
  readonly abortThreshold: number;
  readonly recordTimeoutMs: number;
  readonly clockSkewToleranceMs: number;
  readonly sampling: SamplingPolicy;
}

// Observable type alias for streams
export type Stream<A> = Observable<A>;
