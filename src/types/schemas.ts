/**
 * io-ts schemas for runtime type validation
 */

import * as t from 'io-ts';
import { pipe } from 'fp-ts/function';
import * as E from 'fp-ts/Either';
import type { Either } from 'fp-ts/Either';
import { PathReporter } from 'io-ts/PathReporter';
import type { FieldValue } from './base';
import type { ValidationDetail, ValidationError } from './errors';
import { validationError } from './errors';

// Custom codecs
const boundedNumber = (name: string, min: number, max: number, integer = false) =>
  new t.Type<number, number, unknown>(
    name,
    (u): u is number =>
      typeof u === 'number' && u >= min && u <= max && (!integer || Number.isInteger(u)),
    (u, c) =>
      pipe(
        t.number.validate(u, c),
        E.chain((n) =>
          n >= min && n <= max && (!integer || Number.isInteger(n))
            ? t.success(n)
            : t.failure(u, c, `${name} must be within [${min}, ${max}]`),
        ),
      ),
    t.identity,
  );

const nonEmptyArray = <C extends t.Mixed>(item: C, name: string) =>
  new t.Type<ReadonlyArray<t.TypeOf<C>>, ReadonlyArray<t.OutputOf<C>>, unknown>(
    name,
    (u): u is ReadonlyArray<t.TypeOf<C>> =>
      Array.isArray(u) && u.length > 0 && u.every((x) => item.is(x)),
    (u, c) =>
      pipe(
        t.readonlyArray(item).validate(u, c),
        E.chain((items) =>
          items.length > 0 ? t.success(items) : t.failure(u, c, `${name} must not be empty`),
        ),
      ),
    (a) => a.map((x) => item.encode(x)),
  );

const NonEmptyString = new t.Type<string, string, unknown>(
  'NonEmptyString',
  (u): u is string => typeof u === 'string' && u.length > 0,
  (u, c) =>
    typeof u === 'string' && u.length > 0 ? t.success(u) : t.failure(u, c, 'must be a non-empty string'),
  t.identity,
);

export const NonNegativeNumber = boundedNumber('NonNegativeNumber', 0, Number.MAX_SAFE_INTEGER);
export const PositiveInteger = boundedNumber('PositiveInteger', 1, Number.MAX_SAFE_INTEGER, true);
export const NonNegativeInteger = boundedNumber('NonNegativeInteger', 0, Number.MAX_SAFE_INTEGER, true);
export const Ratio = boundedNumber('Ratio', 0, 1);

// Field values
export const FieldValueCodec: t.Type<FieldValue> = t.recursion<FieldValue>('FieldValue', () =>
  t.union([
    t.string,
    t.number,
    t.boolean,
    t.null,
    t.readonlyArray(FieldValueCodec),
    t.record(t.string, FieldValueCodec),
  ]),
);

export const FieldMapCodec = t.record(t.string, FieldValueCodec);

export const FieldTypeCodec = t.keyof({
  string: null,
  integer: null,
  decimal: null,
  boolean: null,
  date: null,
  datetime: null,
  code: null,
  list: null,
  object: null,
});

export const SeverityCodec = t.keyof({ low: null, medium: null, high: null, critical: null });

export const EhrSystemCodec = t.keyof({
  epic: null,
  cerner: null,
  meditech: null,
  allscripts: null,
  athena: null,
  eclinicalworks: null,
  nextgen: null,
  practicefusion: null,
  kareo: null,
  drchrono: null,
});

// Schema mappings
export const FieldMappingCodec = t.intersection([
  t.type({
    sourceField: NonEmptyString,
    targetField: NonEmptyString,
    sourceType: FieldTypeCodec,
    targetType: FieldTypeCodec,
    required: t.boolean,
  }),
  t.partial({
    transform: t.string,
    defaultValue: FieldValueCodec,
    clinicallySignificant: t.boolean,
    importance: t.keyof({ medium: null, low: null }),
    merge: t.string,
  }),
]);

const BoundsCodec = t.partial({ min: t.number, max: t.number });

export const FieldValidationCodec = t.union([
  t.intersection([
    t.type({ type: t.literal('range'), field: t.string, severity: SeverityCodec }),
    BoundsCodec,
  ]),
  t.intersection([
    t.type({ type: t.literal('length'), field: t.string, severity: SeverityCodec }),
    BoundsCodec,
  ]),
  t.type({ type: t.literal('pattern'), field: t.string, pattern: t.string, severity: SeverityCodec }),
]);

export const SchemaMappingInputCodec = t.intersection([
  t.type({
    sourceSystem: NonEmptyString,
    targetSystem: NonEmptyString,
    resourceType: NonEmptyString,
    fieldMappings: nonEmptyArray(FieldMappingCodec, 'fieldMappings'),
  }),
  t.partial({
    validations: t.readonlyArray(FieldValidationCodec),
  }),
]);

// Records
export const DataRecordCodec = t.intersection([
  t.type({
    resourceType: NonEmptyString,
    resourceId: NonEmptyString,
    sourceSystem: t.string,
    fields: FieldMapCodec,
    updatedAt: t.number,
  }),
  t.partial({
    mappingVersion: t.number,
    deleted: t.boolean,
    readOnly: t.boolean,
  }),
]);

// Resolution strategies
export const StrategyNameCodec = t.keyof({
  sourceWins: null,
  targetWins: null,
  timestamp: null,
  priority: null,
  merge: null,
  manual: null,
  custom: null,
});

export const ConflictTypeCodec = t.keyof({
  data: null,
  schema: null,
  version: null,
  access: null,
  timing: null,
});

export const ResolutionRuleCodec = t.intersection([
  t.type({
    ruleId: NonEmptyString,
    priority: t.number,
    strategy: StrategyNameCodec,
  }),
  t.partial({
    fields: t.readonlyArray(t.string),
    conflictTypes: t.readonlyArray(ConflictTypeCodec),
    severities: t.readonlyArray(SeverityCodec),
  }),
]);

export const ResolutionStrategyCodec = t.intersection([
  t.type({
    name: StrategyNameCodec,
    rules: t.readonlyArray(ResolutionRuleCodec),
  }),
  t.partial({
    systemPriority: t.record(t.string, t.number),
    customResolver: t.string,
  }),
]);

export const RetryPolicyCodec = t.type({
  maxRetries: NonNegativeInteger,
  baseDelay: NonNegativeNumber,
  backoffMultiplier: boundedNumber('BackoffMultiplier', 1, 100),
  maxDelay: NonNegativeNumber,
});

// Engine configuration
export const StrategyBindingCodec = t.intersection([
  t.type({ strategy: ResolutionStrategyCodec }),
  t.partial({
    providerId: t.string,
    ehrSystem: t.string,
    resourceType: t.string,
  }),
]);

export const EngineConfigCodec = t.intersection([
  t.type({
    mappings: t.readonlyArray(SchemaMappingInputCodec),
    strategies: t.readonlyArray(StrategyBindingCodec),
    retryPolicy: RetryPolicyCodec,
    batchSize: PositiveInteger,
    abortThreshold: Ratio,
    recordTimeoutMs: PositiveInteger,
    clockSkewToleranceMs: NonNegativeNumber,
    sampling: t.type({
      sampleSize: PositiveInteger,
      severityThreshold: SeverityCodec,
    }),
  }),
  t.partial({
    defaultStrategy: ResolutionStrategyCodec,
  }),
]);

// Requests
export const SyncFilterCodec = t.intersection([
  t.type({
    field: NonEmptyString,
    operator: t.keyof({
      equals: null,
      notEquals: null,
      greaterThan: null,
      lessThan: null,
      contains: null,
      notContains: null,
      startsWith: null,
      endsWith: null,
    }),
    value: t.union([t.string, t.number, t.boolean]),
  }),
  t.partial({ isActive: t.boolean }),
]);

export const SyncRunOptionsCodec = t.partial({
  batchSize: PositiveInteger,
  abortThreshold: Ratio,
  recordTimeoutMs: PositiveInteger,
  retryPolicy: RetryPolicyCodec,
});

export const SynchronizationDataCodec = t.intersection([
  t.type({
    providerId: NonEmptyString,
    ehrSystem: EhrSystemCodec,
    targetSystem: NonEmptyString,
    syncType: t.keyof({ full: null, incremental: null }),
    resourceTypes: nonEmptyArray(NonEmptyString, 'resourceTypes'),
  }),
  t.partial({
    filters: t.readonlyArray(SyncFilterCodec),
    options: SyncRunOptionsCodec,
  }),
]);

export const DataConflictCodec = t.intersection([
  t.type({
    conflictId: NonEmptyString,
    resourceType: NonEmptyString,
    resourceId: NonEmptyString,
    field: t.union([t.string, t.null]),
    conflictType: ConflictTypeCodec,
    sourceValue: FieldValueCodec,
    targetValue: FieldValueCodec,
    sourceUpdatedAt: t.number,
    targetUpdatedAt: t.number,
    sourceSystem: t.string,
    targetSystem: t.string,
    severity: SeverityCodec,
    detectedAt: t.number,
  }),
  t.partial({ merge: t.string }),
]);

export const ConflictDataCodec = t.type({
  conflicts: t.readonlyArray(DataConflictCodec),
  strategy: ResolutionStrategyCodec,
});

// Consistency auditing
const RuleBaseCodec = t.intersection([
  t.type({ ruleId: NonEmptyString, name: NonEmptyString, severity: SeverityCodec }),
  t.partial({ resourceType: t.string, remediation: t.string }),
]);

export const ConsistencyRuleCodec = t.union([
  t.intersection([
    RuleBaseCodec,
    t.type({ kind: t.literal('type-match'), field: NonEmptyString, expectedType: FieldTypeCodec }),
    t.partial({ required: t.boolean }),
  ]),
  t.intersection([
    RuleBaseCodec,
    t.type({
      kind: t.literal('referential-integrity'),
      field: NonEmptyString,
      referencedResourceType: NonEmptyString,
    }),
  ]),
  t.intersection([
    RuleBaseCodec,
    t.type({ kind: t.literal('business-rule'), condition: SyncFilterCodec }),
  ]),
  t.intersection([
    RuleBaseCodec,
    t.type({ kind: t.literal('cross-source-match'), field: NonEmptyString }),
  ]),
]);

export const ConsistencyDataCodec = t.intersection([
  t.type({
    sources: nonEmptyArray(
      t.intersection([
        t.type({ sourceId: NonEmptyString, system: NonEmptyString, resourceType: NonEmptyString }),
        t.partial({ sampleSize: PositiveInteger }),
      ]),
      'sources',
    ),
    rules: t.readonlyArray(ConsistencyRuleCodec),
  }),
  t.partial({
    timeRange: t.type({ start: t.number, end: t.number }),
    sampleSize: PositiveInteger,
    severityThreshold: SeverityCodec,
    options: t.partial({
      validateDataTypes: t.boolean,
      checkReferentialIntegrity: t.boolean,
      validateBusinessRules: t.boolean,
      checkCrossSource: t.boolean,
    }),
  }),
]);

// Validation helper
// Intersection and union members appear in the context under their index
const isCompositeMember = (context: t.Context, index: number): boolean => {
  const parent = context[index - 1];
  return (
    parent !== undefined &&
    (parent.type instanceof t.IntersectionType || parent.type instanceof t.UnionType)
  );
};

const toDetails = (errors: t.Errors): ReadonlyArray<ValidationDetail> =>
  errors.map((error) => {
    const path = error.context
      .filter((entry, index) => entry.key !== '' && !isCompositeMember(error.context, index))
      .map((entry) => entry.key)
      .join('.');
    const expected = error.context[error.context.length - 1]?.type.name ?? 'value';
    return {
      path: path === '' ? '<root>' : path,
      message: error.message ?? `expected ${expected}`,
    };
  });

export const validate = <A>(codec: t.Decoder<unknown, A>, label = codec.name) => (
  value: unknown,
): Either<ValidationError, A> =>
  pipe(
    codec.decode(value),
    E.mapLeft((errors) =>
      validationError(
        `Invalid ${label}: ${PathReporter.report(E.left(errors)).join('; ')}`,
        toDetails(errors),
      ),
    ),
  );
