/**
 * Conflict detection for sync operations
 */

import { pipe } from 'fp-ts/function';
import * as O from 'fp-ts/Option';
import type {
  ConflictType,
  DataConflict,
  DataRecord,
  FieldValue,
  SchemaMapping,
  Severity,
  Timestamp,
  TransformedRecord,
} from '../types';
import { findByTarget } from '../catalog/schema-catalog';
import { conformsTo } from '../transform/coercion';
import { valuesEqual } from '../utils/checksum';

// Conflict detection options
export interface ConflictDetectionOptions {
  readonly clockSkewToleranceMs?: number;
  readonly now?: () => Timestamp;
}

export const DEFAULT_CLOCK_SKEW_TOLERANCE_MS = 5 * 60 * 1000;

const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

export const maxSeverity = (a: Severity, b: Severity): Severity =>
  SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b;

export const severityAtLeast = (severity: Severity, threshold: Severity): boolean =>
  SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];

export const conflictIdFor = (
  resourceType: string,
  resourceId: string,
  field: string | null,
  conflictType: ConflictType,
): string => `conflict_${resourceType}_${resourceId}_${field ?? '*'}_${conflictType}`;

// Severity from the mapping metadata of a target field
export const fieldSeverity = (mapping: SchemaMapping, targetField: string): Severity =>
  pipe(
    findByTarget(mapping, targetField),
    O.match(
      (): Severity => 'medium',
      (fieldMapping) => {
        if (fieldMapping.clinicallySignificant === true) {
          return 'critical';
        }
        return fieldMapping.importance === 'low' ? 'low' : 'medium';
      },
    ),
  );

const present = (value: FieldValue | undefined): value is FieldValue =>
  value !== undefined && value !== null;

// Detect conflicts between a transformed source record and the current target
export const detectConflicts = (
  transformed: TransformedRecord,
  currentTarget: DataRecord | undefined,
  lastSyncAt: Timestamp | undefined,
  mapping: SchemaMapping,
  options: ConflictDetectionOptions = {},
): ReadonlyArray<DataConflict> => {
  if (currentTarget === undefined) {
    return [];
  }
  const target = currentTarget;

  const syncPoint = lastSyncAt ?? 0;
  const sourceChanged = transformed.updatedAt > syncPoint;
  const targetChanged = target.updatedAt > syncPoint;
  if (!sourceChanged || !targetChanged) {
    return [];
  }

  const now = (options.now ?? Date.now)();
  const tolerance = options.clockSkewToleranceMs ?? DEFAULT_CLOCK_SKEW_TOLERANCE_MS;

  const conflict = (
    field: string | null,
    conflictType: ConflictType,
    sourceValue: FieldValue,
    targetValue: FieldValue,
    severity: Severity,
  ): DataConflict => {
    const merge = field === null
      ? undefined
      : pipe(
          findByTarget(mapping, field),
          O.chain((m) => O.fromNullable(m.merge)),
          O.toUndefined,
        );
    return {
      conflictId: conflictIdFor(transformed.resourceType, transformed.resourceId, field, conflictType),
      resourceType: transformed.resourceType,
      resourceId: transformed.resourceId,
      field,
      conflictType,
      sourceValue,
      targetValue,
      sourceUpdatedAt: transformed.updatedAt,
      targetUpdatedAt: target.updatedAt,
      sourceSystem: transformed.sourceSystem,
      targetSystem: transformed.targetSystem,
      severity,
      ...(merge === undefined ? {} : { merge }),
      detectedAt: now,
    };
  };

  // Record-level checks
  if (transformed.updatedAt > now + tolerance || target.updatedAt > now + tolerance) {
    return [conflict(null, 'timing', transformed.fields, target.fields, 'high')];
  }

  if (transformed.deleted === true) {
    return [conflict(null, 'data', null, target.fields, 'high')];
  }

  if (target.readOnly === true) {
    const differs = Object.entries(transformed.fields).some(
      ([field, value]) => !valuesEqual(value, target.fields[field] ?? null),
    );
    return differs
      ? [conflict(null, 'access', transformed.fields, target.fields, 'high')]
      : [];
  }

  // Field-level checks, schema > version > data
  return Object.entries(transformed.fields).flatMap(([field, sourceValue]) => {
    const targetValue = target.fields[field];
    if (!present(targetValue) || valuesEqual(sourceValue, targetValue)) {
      return [];
    }

    const severity = fieldSeverity(mapping, field);
    const targetType = pipe(
      findByTarget(mapping, field),
      O.map((m) => m.targetType),
      O.toUndefined,
    );

    if (targetType !== undefined && !conformsTo(targetValue, targetType)) {
      return [conflict(field, 'schema', sourceValue, targetValue, maxSeverity(severity, 'high'))];
    }
    if (
      target.mappingVersion !== undefined &&
      target.mappingVersion !== transformed.mappingVersion
    ) {
      return [conflict(field, 'version', sourceValue, targetValue, severity)];
    }
    return [conflict(field, 'data', sourceValue, targetValue, severity)];
  });
};

export interface ConflictDetector {
  readonly detect: (
    transformed: TransformedRecord,
    currentTarget: DataRecord | undefined,
    lastSyncAt: Timestamp | undefined,
    mapping: SchemaMapping,
  ) => ReadonlyArray<DataConflict>;
}

// Create conflict detector bound to its options
export const createConflictDetector = (
  options: ConflictDetectionOptions = {},
): ConflictDetector => ({
  detect: (transformed, currentTarget, lastSyncAt, mapping) =>
    detectConflicts(transformed, currentTarget, lastSyncAt, mapping, options),
});
