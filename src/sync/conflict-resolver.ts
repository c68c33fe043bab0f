/**
 * Conflict resolution logic
 */

import { pipe } from 'fp-ts/function';
import * as E from 'fp-ts/Either';
import type { Either } from 'fp-ts/Either';
import type {
  ConflictPatternSummary,
  ConflictResolution,
  ConflictResolutionResult,
  DataConflict,
  FieldValue,
  ReadonlyRecord,
  ResolutionRule,
  ResolutionStrategy,
  StrategyName,
  Timestamp,
} from '../types';
import type { ConflictError } from '../types/errors';
import { conflictError } from '../types/errors';
import { toErrorEntry } from '../errors/handler';
import type { MergeRegistry } from './merge';
import { findMerge } from './merge';

export type Side = 'source' | 'target';

export type CustomOutcome =
  | { readonly kind: 'pick'; readonly side: Side }
  | { readonly kind: 'value'; readonly value: FieldValue };

export type CustomResolver = (conflict: DataConflict) => Either<string, CustomOutcome>;

export type CustomResolverRegistry = ReadonlyRecord<string, CustomResolver>;

export interface ResolverOptions {
  readonly merges?: MergeRegistry;
  readonly customResolvers?: CustomResolverRegistry;
  readonly now?: () => Timestamp;
}

// Outcome for every conflict of one resource, decided as a unit
export type ResourceResolution =
  | {
      readonly status: 'resolved';
      readonly resourceType: string;
      readonly resourceId: string;
      readonly resolutions: ReadonlyArray<ConflictResolution>;
      readonly fields: ReadonlyRecord<string, FieldValue>;
      readonly recordSide?: Side;
    }
  | {
      readonly status: 'pending';
      readonly resourceType: string;
      readonly resourceId: string;
      readonly conflicts: ReadonlyArray<DataConflict>;
      readonly error: ConflictError;
    };

interface Decision {
  readonly finalValue: FieldValue;
  readonly side?: Side;
  readonly justification: string;
}

export interface SelectedRule {
  readonly strategy: StrategyName;
  readonly ruleId: string;
}

const ruleMatches = (rule: ResolutionRule, conflict: DataConflict): boolean =>
  (rule.fields === undefined ||
    (conflict.field !== null && rule.fields.includes(conflict.field))) &&
  (rule.conflictTypes === undefined || rule.conflictTypes.includes(conflict.conflictType)) &&
  (rule.severities === undefined || rule.severities.includes(conflict.severity));

const byPriority = (a: ResolutionRule, b: ResolutionRule): number =>
  b.priority - a.priority || (a.ruleId < b.ruleId ? -1 : a.ruleId > b.ruleId ? 1 : 0);

// First matching rule by descending priority, else the strategy's own name
export const selectRule = (conflict: DataConflict, strategy: ResolutionStrategy): SelectedRule => {
  const rule = [...strategy.rules].sort(byPriority).find((r) => ruleMatches(r, conflict));
  return rule === undefined
    ? { strategy: strategy.name, ruleId: 'default' }
    : { strategy: rule.strategy, ruleId: rule.ruleId };
};

const pick = (conflict: DataConflict, side: Side, justification: string): Decision => ({
  finalValue: side === 'source' ? conflict.sourceValue : conflict.targetValue,
  side,
  justification,
});

const decide = (
  conflict: DataConflict,
  name: StrategyName,
  strategy: ResolutionStrategy,
  options: ResolverOptions,
): Either<string, Decision> => {
  switch (name) {
    case 'sourceWins':
      return E.right(pick(conflict, 'source', 'source wins by policy'));
    case 'targetWins':
      return E.right(pick(conflict, 'target', 'target wins by policy'));
    case 'timestamp':
      return E.right(
        conflict.sourceUpdatedAt >= conflict.targetUpdatedAt
          ? pick(
              conflict,
              'source',
              conflict.sourceUpdatedAt === conflict.targetUpdatedAt
                ? 'equal timestamps, source preferred'
                : 'source is newer',
            )
          : pick(conflict, 'target', 'target is newer'),
      );
    case 'priority': {
      const ranks = strategy.systemPriority ?? {};
      const sourceRank = ranks[conflict.sourceSystem] ?? 0;
      const targetRank = ranks[conflict.targetSystem] ?? 0;
      return E.right(
        sourceRank >= targetRank
          ? pick(conflict, 'source', `${conflict.sourceSystem} rank ${sourceRank} >= ${targetRank}`)
          : pick(conflict, 'target', `${conflict.targetSystem} rank ${targetRank} > ${sourceRank}`),
      );
    }
    case 'merge': {
      if (conflict.field === null) {
        return E.left('record-level conflicts cannot be merged');
      }
      if (conflict.merge === undefined) {
        return E.left(`field ${conflict.field} is not mergeable`);
      }
      const mergeName = conflict.merge;
      const merge = findMerge(mergeName, options.merges);
      if (merge === undefined) {
        return E.left(`merge function ${mergeName} is not registered`);
      }
      return pipe(
        merge(conflict.sourceValue, conflict.targetValue),
        E.map((finalValue): Decision => ({ finalValue, justification: `merged with ${mergeName}` })),
      );
    }
    case 'custom': {
      const resolverName = strategy.customResolver;
      const resolver =
        resolverName === undefined || options.customResolvers === undefined
          ? undefined
          : Object.hasOwn(options.customResolvers, resolverName)
            ? options.customResolvers[resolverName]
            : undefined;
      if (resolverName === undefined || resolver === undefined) {
        return E.left(`custom resolver ${resolverName ?? '(none)'} is not registered`);
      }
      return pipe(
        resolver(conflict),
        E.chain((outcome): Either<string, Decision> => {
          if (outcome.kind === 'pick') {
            return E.right(pick(conflict, outcome.side, `${resolverName} picked ${outcome.side}`));
          }
          return conflict.field === null
            ? E.left('record-level conflicts need a side, not a value')
            : E.right({ finalValue: outcome.value, justification: `${resolverName} supplied a value` });
        }),
      );
    }
    case 'manual':
      return E.left('manual review required');
  }
};

// Resolve every conflict of one resource, or defer all of them
export const resolveResource = (
  conflicts: ReadonlyArray<DataConflict>,
  strategy: ResolutionStrategy,
  options: ResolverOptions = {},
): ResourceResolution => {
  const first = conflicts[0];
  const resourceType = first?.resourceType ?? '';
  const resourceId = first?.resourceId ?? '';
  const now = options.now ?? Date.now;

  const outcomes = conflicts.map((conflict) => {
    const selected = selectRule(conflict, strategy);
    return { conflict, selected, decision: decide(conflict, selected.strategy, strategy, options) };
  });

  const failures = outcomes.flatMap(({ conflict, decision }) =>
    E.isLeft(decision) ? [`${conflict.field ?? 'record'}: ${decision.left}`] : [],
  );
  if (failures.length > 0) {
    return {
      status: 'pending',
      resourceType,
      resourceId,
      conflicts,
      error: conflictError(`Deferred to manual review (${failures.join('; ')})`, conflicts, {
        resourceId,
      }),
    };
  }

  const resolvedAt = now();
  const resolutions: ConflictResolution[] = [];
  const fields: Record<string, FieldValue> = {};
  let recordSide: Side | undefined;

  for (const { conflict, selected, decision } of outcomes) {
    if (E.isLeft(decision)) {
      continue;
    }
    resolutions.push({
      conflictId: conflict.conflictId,
      resourceId: conflict.resourceId,
      field: conflict.field,
      strategyApplied: selected.strategy,
      ruleId: selected.ruleId,
      sourceValue: conflict.sourceValue,
      targetValue: conflict.targetValue,
      finalValue: decision.right.finalValue,
      justification: decision.right.justification,
      resolvedAt,
    });
    if (conflict.field === null) {
      recordSide = decision.right.side;
    } else {
      fields[conflict.field] = decision.right.finalValue;
    }
  }

  return {
    status: 'resolved',
    resourceType,
    resourceId,
    resolutions,
    fields,
    ...(recordSide === undefined ? {} : { recordSide }),
  };
};

const resourceKey = (conflict: DataConflict): string =>
  `${conflict.resourceType}:${conflict.resourceId}`;

// Group conflicts by resource, keeping first-seen order
export const groupByResource = (
  conflicts: ReadonlyArray<DataConflict>,
): ReadonlyArray<ReadonlyArray<DataConflict>> => {
  const groups = new Map<string, DataConflict[]>();
  conflicts.forEach((conflict) => {
    const key = resourceKey(conflict);
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [conflict]);
    } else {
      group.push(conflict);
    }
  });
  return Array.from(groups.values());
};

export const summarizePatterns = (
  conflicts: ReadonlyArray<DataConflict>,
): ReadonlyArray<ConflictPatternSummary> => {
  const counts = new Map<string, ConflictPatternSummary>();
  conflicts.forEach((conflict) => {
    const key = `${conflict.field ?? ''}|${conflict.conflictType}`;
    const existing = counts.get(key);
    counts.set(key, {
      field: conflict.field,
      conflictType: conflict.conflictType,
      count: (existing?.count ?? 0) + 1,
    });
  });
  return Array.from(counts.values()).sort(
    (a, b) => b.count - a.count || (a.field ?? '').localeCompare(b.field ?? ''),
  );
};

// Resolve a batch of conflicts under one strategy
export const resolveConflicts = (
  conflicts: ReadonlyArray<DataConflict>,
  strategy: ResolutionStrategy,
  options: ResolverOptions = {},
): ConflictResolutionResult => {
  const outcomes = groupByResource(conflicts).map((group) =>
    resolveResource(group, strategy, options),
  );
  const resolutions = outcomes.flatMap((o) => (o.status === 'resolved' ? o.resolutions : []));
  const pending = outcomes.flatMap((o) => (o.status === 'pending' ? [o] : []));
  const remaining = pending.reduce((sum, o) => sum + o.conflicts.length, 0);

  return {
    success: remaining === 0,
    conflictsResolved: resolutions.length,
    conflictsRemaining: remaining,
    strategyUsed: strategy.name,
    resolutions,
    pendingResourceIds: pending.map((o) => o.resourceId),
    patterns: summarizePatterns(conflicts),
    errors: pending.map((o) => toErrorEntry(o.error)),
  };
};

export interface ConflictResolver {
  readonly resolveResource: (
    conflicts: ReadonlyArray<DataConflict>,
    strategy: ResolutionStrategy,
  ) => ResourceResolution;
  readonly resolve: (
    conflicts: ReadonlyArray<DataConflict>,
    strategy: ResolutionStrategy,
  ) => ConflictResolutionResult;
}

export const createConflictResolver = (options: ResolverOptions = {}): ConflictResolver => ({
  resolveResource: (conflicts, strategy) => resolveResource(conflicts, strategy, options),
  resolve: (conflicts, strategy) => resolveConflicts(conflicts, strategy, options),
});
