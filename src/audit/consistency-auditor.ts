/**
 * Cross-source consistency auditing over sampled records
 *
 * Read-only: samples come from the sampling port and nothing is written back.
 */

import { pipe } from 'fp-ts/function';
import * as A from 'fp-ts/ReadonlyArray';
import * as TE from 'fp-ts/TaskEither';
import type { TaskEither } from 'fp-ts/TaskEither';
import { v4 as uuidv4 } from 'uuid';
import type {
  ConsistencyCheckOptions,
  ConsistencyData,
  ConsistencyIssue,
  ConsistencyRecommendation,
  ConsistencyResult,
  ConsistencyRule,
  DataSample,
  DataSourceRef,
  IssueType,
  RecommendationType,
  SamplingPolicy,
  Severity,
  Timestamp,
} from '../types';
import type { SyncError } from '../types/errors';
import { ConsistencyDataCodec, validate } from '../types/schemas';
import type { Logger } from '../errors/handler';
import { consoleLogger } from '../errors/handler';
import type { SamplingSource } from '../adapters/sampling';
import { conformsTo, readPath } from '../transform/coercion';
import { valuesEqual } from '../utils/checksum';
import { matchesFilter } from '../sync/filter';
import { severityAtLeast } from '../sync/conflict-detector';

export interface ConsistencyAuditorDeps {
  readonly sampling: SamplingSource;
  readonly policy?: SamplingPolicy;
  readonly logger?: Logger;
  readonly now?: () => Timestamp;
  readonly generateId?: () => string;
}

export interface ConsistencyAuditor {
  readonly checkConsistency: (data: ConsistencyData) => TaskEither<SyncError, ConsistencyResult>;
}

export const defaultSamplingPolicy: SamplingPolicy = {
  sampleSize: 100,
  severityThreshold: 'low',
};

// Result of evaluating one rule against one sample
interface Check {
  readonly rule: ConsistencyRule;
  readonly sample: DataSample;
  readonly passed: boolean;
  readonly description: string;
}

const ISSUE_TYPES: Readonly<Record<ConsistencyRule['kind'], IssueType>> = {
  'type-match': 'dataType',
  'referential-integrity': 'referentialIntegrity',
  'business-rule': 'businessRule',
  'cross-source-match': 'crossSource',
};

const RECOMMENDATION_TYPES: Readonly<Record<IssueType, RecommendationType>> = {
  dataType: 'schemaUpdate',
  referentialIntegrity: 'dataCorrection',
  businessRule: 'dataCorrection',
  crossSource: 'processImprovement',
};

const isEnabled = (rule: ConsistencyRule, options: ConsistencyCheckOptions): boolean => {
  switch (rule.kind) {
    case 'type-match':
      return options.validateDataTypes !== false;
    case 'referential-integrity':
      return options.checkReferentialIntegrity !== false;
    case 'business-rule':
      return options.validateBusinessRules !== false;
    case 'cross-source-match':
      return options.checkCrossSource !== false;
  }
};

const appliesTo = (rule: ConsistencyRule, sample: DataSample): boolean =>
  rule.resourceType === undefined || rule.resourceType === sample.resourceType;

export const defaultRemediation = (rule: ConsistencyRule): string => {
  switch (rule.kind) {
    case 'type-match':
      return `Correct ${rule.field} to a valid ${rule.expectedType} at the source`;
    case 'referential-integrity':
      return `Restore the referenced ${rule.referencedResourceType} or repoint ${rule.field}`;
    case 'business-rule':
      return `Review records violating "${rule.name}"`;
    case 'cross-source-match':
      return `Reconcile ${rule.field} between sources`;
  }
};

const pass = (rule: ConsistencyRule, sample: DataSample): Check => ({
  rule,
  sample,
  passed: true,
  description: '',
});

const fail = (rule: ConsistencyRule, sample: DataSample, description: string): Check => ({
  rule,
  sample,
  passed: false,
  description,
});

const refKey = (resourceType: string, resourceId: string): string => `${resourceType}:${resourceId}`;

// Local checks that need nothing beyond the sample itself
const checkLocal = (rule: ConsistencyRule, sample: DataSample): Check | undefined => {
  switch (rule.kind) {
    case 'type-match': {
      const value = readPath(sample.fields, rule.field);
      if (value === undefined || value === null) {
        return rule.required === true ? fail(rule, sample, `${rule.field} is missing`) : pass(rule, sample);
      }
      return conformsTo(value, rule.expectedType)
        ? pass(rule, sample)
        : fail(rule, sample, `${rule.field} is not a valid ${rule.expectedType}`);
    }
    case 'business-rule': {
      const { field, operator, value } = rule.condition;
      return matchesFilter(sample.fields, rule.condition)
        ? pass(rule, sample)
        : fail(rule, sample, `${field} ${operator} ${String(value)} does not hold`);
    }
    default:
      return undefined;
  }
};

// Same resource seen by other sources must agree on the field
const checkCrossSource = (
  rule: Extract<ConsistencyRule, { kind: 'cross-source-match' }>,
  sample: DataSample,
  peers: ReadonlyArray<DataSample>,
): Check | undefined => {
  const others = peers.filter((peer) => peer.sourceId !== sample.sourceId);
  if (others.length === 0) {
    return undefined;
  }
  const value = readPath(sample.fields, rule.field) ?? null;
  const disagreeing = others.filter((peer) => !valuesEqual(readPath(peer.fields, rule.field) ?? null, value));
  return disagreeing.length === 0
    ? pass(rule, sample)
    : fail(
        rule,
        sample,
        `${rule.field} differs from ${disagreeing.map((peer) => peer.sourceId).join(', ')}`,
      );
};

export const scoreOf = (passed: number, total: number): number =>
  total === 0 ? 100 : Math.round((1000 * passed) / total) / 10;

const recommend = (
  checks: ReadonlyArray<Check>,
  issues: ReadonlyArray<ConsistencyIssue>,
): ReadonlyArray<ConsistencyRecommendation> => {
  const byRule = new Map<string, { rule: ConsistencyRule; failed: number; checked: number }>();
  checks.forEach(({ rule }) => {
    const entry = byRule.get(rule.ruleId) ?? { rule, failed: 0, checked: 0 };
    byRule.set(rule.ruleId, { ...entry, checked: entry.checked + 1 });
  });
  issues.forEach((issue) => {
    const entry = byRule.get(issue.ruleId);
    if (entry !== undefined) {
      byRule.set(issue.ruleId, { ...entry, failed: entry.failed + 1 });
    }
  });

  return Array.from(byRule.values())
    .filter((entry) => entry.failed > 0)
    .map(({ rule, failed, checked }) => ({
      ruleId: rule.ruleId,
      type: RECOMMENDATION_TYPES[ISSUE_TYPES[rule.kind]],
      description: `${rule.name}: ${failed} of ${checked} checks failed. ${
        rule.remediation ?? defaultRemediation(rule)
      }`,
      priority: rule.severity,
      affectedRecords: failed,
    }))
    .sort((a, b) => b.affectedRecords - a.affectedRecords || a.ruleId.localeCompare(b.ruleId));
};

export const createConsistencyAuditor = (deps: ConsistencyAuditorDeps): ConsistencyAuditor => {
  const logger = deps.logger ?? consoleLogger;
  const now = deps.now ?? Date.now;
  const generateId = deps.generateId ?? (() => `issue_${uuidv4()}`);
  const policy = deps.policy ?? defaultSamplingPolicy;

  const collect = (data: ConsistencyData): TaskEither<SyncError, ReadonlyArray<DataSample>> =>
    pipe(
      data.sources,
      A.traverse(TE.ApplicativeSeq)((source: DataSourceRef) =>
        deps.sampling.sample(source, {
          sampleSize: source.sampleSize ?? data.sampleSize ?? policy.sampleSize,
          timeRange: data.timeRange,
        }),
      ),
      TE.map(A.flatten),
    );

  // Referenced ids found among the samples need no lookup
  const checkReferences = (
    rules: ReadonlyArray<Extract<ConsistencyRule, { kind: 'referential-integrity' }>>,
    samples: ReadonlyArray<DataSample>,
  ): TaskEither<SyncError, ReadonlyArray<Check>> => {
    const sampled = new Set(samples.map((s) => refKey(s.resourceType, s.resourceId)));
    const exists = deps.sampling.exists;

    const checkOne = (
      rule: Extract<ConsistencyRule, { kind: 'referential-integrity' }>,
      sample: DataSample,
    ): TaskEither<SyncError, Check> => {
      const reference = readPath(sample.fields, rule.field);
      if (reference === undefined || reference === null) {
        return TE.of(pass(rule, sample));
      }
      if (typeof reference !== 'string') {
        return TE.of(fail(rule, sample, `${rule.field} is not a reference`));
      }
      const missing = fail(
        rule,
        sample,
        `${rule.field} references missing ${rule.referencedResourceType}/${reference}`,
      );
      if (sampled.has(refKey(rule.referencedResourceType, reference))) {
        return TE.of(pass(rule, sample));
      }
      return exists === undefined
        ? TE.of(missing)
        : pipe(
            exists(rule.referencedResourceType, reference),
            TE.map((found) => (found ? pass(rule, sample) : missing)),
          );
    };

    return pipe(
      rules.flatMap((rule) =>
        samples.filter((sample) => appliesTo(rule, sample)).map((sample) => ({ rule, sample })),
      ),
      A.traverse(TE.ApplicativeSeq)(({ rule, sample }) => checkOne(rule, sample)),
    );
  };

  const evaluate = (
    data: ConsistencyData,
    samples: ReadonlyArray<DataSample>,
  ): TaskEither<SyncError, ReadonlyArray<Check>> => {
    const rules = data.rules.filter((rule) => isEnabled(rule, data.options ?? {}));
    const peers = new Map<string, DataSample[]>();
    samples.forEach((sample) => {
      const key = refKey(sample.resourceType, sample.resourceId);
      peers.set(key, [...(peers.get(key) ?? []), sample]);
    });

    const local = samples.flatMap((sample) =>
      rules.flatMap((rule): ReadonlyArray<Check> => {
        if (!appliesTo(rule, sample)) {
          return [];
        }
        const check =
          rule.kind === 'cross-source-match'
            ? checkCrossSource(rule, sample, peers.get(refKey(sample.resourceType, sample.resourceId)) ?? [])
            : checkLocal(rule, sample);
        return check === undefined ? [] : [check];
      }),
    );
    const referential = rules.flatMap((rule) => (rule.kind === 'referential-integrity' ? [rule] : []));

    return pipe(
      checkReferences(referential, samples),
      TE.map((references) => [...local, ...references]),
    );
  };

  const report = (
    data: ConsistencyData,
    samples: ReadonlyArray<DataSample>,
    checks: ReadonlyArray<Check>,
  ): ConsistencyResult => {
    const threshold: Severity = data.severityThreshold ?? policy.severityThreshold;
    const passed = checks.filter((check) => check.passed).length;
    const issues = checks
      .filter((check) => !check.passed && severityAtLeast(check.rule.severity, threshold))
      .map(
        ({ rule, sample, description }): ConsistencyIssue => ({
          issueId: generateId(),
          ruleId: rule.ruleId,
          ruleName: rule.name,
          type: ISSUE_TYPES[rule.kind],
          severity: rule.severity,
          sourceId: sample.sourceId,
          resourceId: sample.resourceId,
          description,
          remediation: rule.remediation ?? defaultRemediation(rule),
        }),
      );

    return {
      success: issues.length === 0,
      score: scoreOf(passed, checks.length),
      checksRun: checks.length,
      checksPassed: passed,
      samplesChecked: samples.length,
      issues,
      recommendations: recommend(checks, issues),
      checkedAt: now(),
    };
  };

  return {
    checkConsistency: (data) =>
      pipe(
        TE.fromEither(validate(ConsistencyDataCodec, 'ConsistencyData')(data)),
        TE.chainW(() => collect(data)),
        TE.chain((samples) =>
          pipe(
            evaluate(data, samples),
            TE.map((checks) => report(data, samples, checks)),
          ),
        ),
        TE.map((result) => {
          logger.log('info', `Consistency check scored ${result.score}`, {
            samples: result.samplesChecked,
            checks: result.checksRun,
            issues: result.issues.length,
          });
          return result;
        }),
      ),
  };
};
