/**
 * Tests for the transformation engine
 */

import { describe, it, expect } from 'vitest';
import * as E from 'fp-ts/Either';
import { createTransformationEngine, transformRecord } from './engine';
import type { DataRecord, SchemaMapping } from '../types/base';

const mapping: SchemaMapping = {
  sourceSystem: 'epic',
  targetSystem: 'warehouse',
  resourceType: 'Observation',
  version: 2,
  createdAt: 0,
  fieldMappings: [
    { sourceField: 'vitals.heartRate', targetField: 'heart_rate', sourceType: 'string', targetType: 'integer', required: true },
    { sourceField: 'unit', targetField: 'unit', sourceType: 'string', targetType: 'code', required: false, defaultValue: 'bpm' },
    { sourceField: 'allergies', targetField: 'allergies', sourceType: 'string', targetType: 'list', required: false, transform: 'lowercase|splitComma' },
  ],
  validations: [{ type: 'range', field: 'heart_rate', min: 20, max: 250, severity: 'high' }],
};

const record = (fields: DataRecord['fields'], extra: Partial<DataRecord> = {}): DataRecord => ({
  resourceType: 'Observation',
  resourceId: 'obs-1',
  sourceSystem: 'epic',
  fields,
  updatedAt: 1000,
  ...extra,
});

describe('TransformationEngine', () => {
  it('should map, transform and coerce declared fields only', () => {
    const result = transformRecord(
      record({ vitals: { heartRate: '72' }, allergies: 'Penicillin, Latex', internal: 'x' }),
      mapping,
    );

    expect(result._tag).toBe('Right');
    if (result._tag === 'Right') {
      expect(result.right.fields).toEqual({
        heart_rate: 72,
        unit: 'bpm',
        allergies: ['penicillin', 'latex'],
      });
      expect(result.right.mappingVersion).toBe(2);
      expect(result.right.targetSystem).toBe('warehouse');
      expect(result.right.warnings).toEqual([
        { code: 'defaulted', field: 'unit', message: 'unit absent, default used', severity: 'low' },
      ]);
    }
  });

  it('should fail a missing required field', () => {
    const result = transformRecord(record({ allergies: 'latex' }), mapping);

    expect(result._tag).toBe('Left');
    if (result._tag === 'Left') {
      expect(result.left.reason).toBe('missing-required-field');
      expect(result.left.field).toBe('vitals.heartRate');
      expect(result.left.resourceId).toBe('obs-1');
    }
  });

  it('should report a type mismatch', () => {
    const result = transformRecord(record({ vitals: { heartRate: 'fast' } }), mapping);

    expect(result._tag).toBe('Left');
    if (result._tag === 'Left') {
      expect(result.left.reason).toBe('type-mismatch');
      expect(result.left.message).toBe('vitals.heartRate: Cannot coerce "fast" to integer');
    }
  });

  it('should turn failed validations into warnings', () => {
    const result = transformRecord(record({ vitals: { heartRate: '300' }, unit: 'bpm' }), mapping);

    expect(result._tag).toBe('Right');
    if (result._tag === 'Right') {
      expect(result.right.warnings).toEqual([
        { code: 'validation-failed', field: 'heart_rate', message: '300 is above 250', severity: 'high' },
      ]);
    }
  });

  it('should be deterministic', () => {
    const engine = createTransformationEngine();
    const input = record({ vitals: { heartRate: '72' }, unit: 'bpm' });

    const first = engine.transform(input, mapping);
    const second = engine.transform(input, mapping);

    expect(first).toEqual(second);
    expect(E.isRight(first) && E.isRight(second) && first.right.checksum === second.right.checksum).toBe(true);
  });

  it('should give tombstones an empty field set', () => {
    const result = transformRecord(record({}, { deleted: true }), mapping);

    expect(result._tag).toBe('Right');
    if (result._tag === 'Right') {
      expect(result.right.fields).toEqual({});
      expect(result.right.deleted).toBe(true);
    }
  });

  it('should use the injected transform registry', () => {
    const custom: SchemaMapping = {
      ...mapping,
      fieldMappings: [
        { sourceField: 'code', targetField: 'code', sourceType: 'string', targetType: 'code', required: true, transform: 'loinc' },
      ],
      validations: [],
    };
    const engine = createTransformationEngine({ loinc: (value) => E.right(`LOINC:${String(value)}`) });

    const result = engine.transform(record({ code: '8867-4' }), custom);

    expect(result._tag === 'Right' && result.right.fields).toEqual({ code: 'LOINC:8867-4' });
  });
});
