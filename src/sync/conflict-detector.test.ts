/**
 * Tests for conflict detector
 */

import { describe, it, expect } from 'vitest';
import { createConflictDetector, detectConflicts } from './conflict-detector';
import type { DataRecord, SchemaMapping, TransformedRecord } from '../types';

const at = (hour: number, minute = 0) => Date.UTC(2024, 0, 1, hour, minute);
const NOW = at(12);

const mapping: SchemaMapping = {
  sourceSystem: 'epic',
  targetSystem: 'warehouse',
  resourceType: 'Observation',
  version: 1,
  createdAt: 0,
  validations: [],
  fieldMappings: [
    { sourceField: 'heartRate', targetField: 'heart_rate', sourceType: 'integer', targetType: 'integer', required: true },
    { sourceField: 'allergies', targetField: 'allergies', sourceType: 'list', targetType: 'list', required: false, clinicallySignificant: true, merge: 'union' },
    { sourceField: 'note', targetField: 'note', sourceType: 'string', targetType: 'string', required: false, importance: 'low' },
  ],
};

const source = (fields: TransformedRecord['fields'], updatedAt = at(10), extra: Partial<TransformedRecord> = {}): TransformedRecord => ({
  resourceType: 'Observation',
  resourceId: 'obs-1',
  sourceSystem: 'epic',
  targetSystem: 'warehouse',
  fields,
  updatedAt,
  mappingVersion: 1,
  warnings: [],
  checksum: 'x',
  ...extra,
});

const target = (fields: DataRecord['fields'], updatedAt = at(9, 50), extra: Partial<DataRecord> = {}): DataRecord => ({
  resourceType: 'Observation',
  resourceId: 'obs-1',
  sourceSystem: 'warehouse',
  fields,
  updatedAt,
  mappingVersion: 1,
  ...extra,
});

const detector = createConflictDetector({ now: () => NOW });

describe('Conflict Detector', () => {
  it('should flag a data conflict when both sides changed since the last sync', () => {
    const conflicts = detector.detect(source({ heart_rate: 72 }), target({ heart_rate: 80 }), at(9), mapping);

    expect(conflicts).toEqual([
      {
        conflictId: 'conflict_Observation_obs-1_heart_rate_data',
        resourceType: 'Observation',
        resourceId: 'obs-1',
        field: 'heart_rate',
        conflictType: 'data',
        sourceValue: 72,
        targetValue: 80,
        sourceUpdatedAt: at(10),
        targetUpdatedAt: at(9, 50),
        sourceSystem: 'epic',
        targetSystem: 'warehouse',
        severity: 'medium',
        detectedAt: NOW,
      },
    ]);
  });

  it('should not flag a one-sided source change', () => {
    const conflicts = detector.detect(source({ heart_rate: 72 }), target({ heart_rate: 80 }, at(8)), at(9), mapping);

    expect(conflicts).toEqual([]);
  });

  it('should not flag a one-sided target change', () => {
    const conflicts = detector.detect(source({ heart_rate: 72 }, at(8)), target({ heart_rate: 80 }), at(9), mapping);

    expect(conflicts).toEqual([]);
  });

  it('should treat a missing target as a create', () => {
    expect(detector.detect(source({ heart_rate: 72 }), undefined, at(9), mapping)).toEqual([]);
  });

  it('should treat an unknown sync point as both sides changed', () => {
    const conflicts = detector.detect(source({ heart_rate: 72 }), target({ heart_rate: 80 }), undefined, mapping);

    expect(conflicts.map((c) => c.conflictType)).toEqual(['data']);
  });

  it('should ignore equal values and fields absent on the target', () => {
    const conflicts = detector.detect(
      source({ heart_rate: 72, note: 'rest' }),
      target({ heart_rate: 72 }),
      at(9),
      mapping,
    );

    expect(conflicts).toEqual([]);
  });

  it('should grade severity from mapping metadata and carry the merge name', () => {
    const conflicts = detector.detect(
      source({ allergies: ['latex'], note: 'a' }),
      target({ allergies: ['aspirin'], note: 'b' }),
      at(9),
      mapping,
    );

    expect(conflicts.map((c) => [c.field, c.severity, c.merge])).toEqual([
      ['allergies', 'critical', 'union'],
      ['note', 'low', undefined],
    ]);
  });

  it('should classify a non-conforming target value as a schema conflict', () => {
    const conflicts = detector.detect(source({ heart_rate: 72 }), target({ heart_rate: '80' }), at(9), mapping);

    expect(conflicts.map((c) => [c.conflictType, c.severity])).toEqual([['schema', 'high']]);
  });

  it('should classify mapping version drift as a version conflict', () => {
    const conflicts = detector.detect(
      source({ heart_rate: 72 }, at(10), { mappingVersion: 2 }),
      target({ heart_rate: 80 }),
      at(9),
      mapping,
    );

    expect(conflicts.map((c) => c.conflictType)).toEqual(['version']);
  });

  it('should raise a record-level timing conflict for timestamps beyond the skew tolerance', () => {
    const conflicts = detectConflicts(
      source({ heart_rate: 72 }, NOW + 10 * 60 * 1000),
      target({ heart_rate: 80 }),
      at(9),
      mapping,
      { now: () => NOW },
    );

    expect(conflicts.map((c) => [c.field, c.conflictType, c.severity])).toEqual([[null, 'timing', 'high']]);
  });

  it('should raise an access conflict for a read-only target', () => {
    const conflicts = detector.detect(
      source({ heart_rate: 72 }),
      target({ heart_rate: 80 }, at(9, 50), { readOnly: true }),
      at(9),
      mapping,
    );

    expect(conflicts.map((c) => [c.field, c.conflictType])).toEqual([[null, 'access']]);
  });

  it('should raise a record-level data conflict for a tombstone against an edited target', () => {
    const conflicts = detector.detect(
      source({}, at(10), { deleted: true }),
      target({ heart_rate: 80 }),
      at(9),
      mapping,
    );

    expect(conflicts.map((c) => [c.field, c.conflictType, c.sourceValue])).toEqual([[null, 'data', null]]);
  });
});
