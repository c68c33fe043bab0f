/**
 * Tests for the schema catalog
 */

import { describe, it, expect } from 'vitest';
import * as O from 'fp-ts/Option';
import { createSchemaCatalog, findBySource, findByTarget } from './schema-catalog';
import type { SchemaMappingInput } from '../types/base';

const pair = { sourceSystem: 'epic', targetSystem: 'warehouse' };

const vitals = (targetField = 'heart_rate'): SchemaMappingInput => ({
  ...pair,
  resourceType: 'Observation',
  fieldMappings: [
    { sourceField: 'heartRate', targetField, sourceType: 'integer', targetType: 'integer', required: true },
    { sourceField: 'note', targetField: 'note', sourceType: 'string', targetType: 'string', required: false },
  ],
});

describe('SchemaCatalog', () => {
  it('should assign increasing versions and freeze them', () => {
    const catalog = createSchemaCatalog(() => 1000);

    const first = catalog.register(vitals());
    const second = catalog.register(vitals('hr'));

    expect(first._tag).toBe('Right');
    expect(second._tag).toBe('Right');
    if (first._tag === 'Right' && second._tag === 'Right') {
      expect(first.right.version).toBe(1);
      expect(second.right.version).toBe(2);
      expect(first.right.createdAt).toBe(1000);
      expect(Object.isFrozen(first.right)).toBe(true);
      expect(Object.isFrozen(first.right.fieldMappings[0])).toBe(true);
    }
    expect(catalog.history(pair, 'Observation').map((m) => m.version)).toEqual([1, 2]);
  });

  it('should keep the previous active version when registering without activation', () => {
    const catalog = createSchemaCatalog();
    catalog.register(vitals());
    catalog.register(vitals('hr'), { activate: false });

    const active = catalog.getActive(pair, 'Observation');

    expect(O.isSome(active) && active.value.version).toBe(1);
  });

  it('should activate the first version even when asked not to', () => {
    const catalog = createSchemaCatalog();
    catalog.register(vitals(), { activate: false });

    expect(O.isSome(catalog.getActive(pair, 'Observation'))).toBe(true);
  });

  it('should switch the active version and reject unknown ones', () => {
    const catalog = createSchemaCatalog();
    catalog.register(vitals());
    catalog.register(vitals('hr'));

    expect(catalog.activate(pair, 'Observation', 1)._tag).toBe('Right');
    const active = catalog.getActive(pair, 'Observation');
    expect(O.isSome(active) && active.value.version).toBe(1);

    const missing = catalog.activate(pair, 'Observation', 7);
    expect(missing._tag).toBe('Left');
  });

  it('should reject a target field mapped twice', () => {
    const catalog = createSchemaCatalog();
    const input: SchemaMappingInput = {
      ...pair,
      resourceType: 'Observation',
      fieldMappings: [
        { sourceField: 'a', targetField: 'x', sourceType: 'string', targetType: 'string', required: false },
        { sourceField: 'b', targetField: 'x', sourceType: 'string', targetType: 'string', required: false },
      ],
    };

    const result = catalog.register(input);

    expect(result._tag).toBe('Left');
    if (result._tag === 'Left') {
      expect(result.left.details).toEqual([
        { path: 'fieldMappings.1.targetField', message: 'targetField "x" is mapped more than once' },
      ]);
    }
    expect(catalog.history(pair, 'Observation')).toEqual([]);
  });

  it('should look up a field mapping by either side', () => {
    const catalog = createSchemaCatalog();
    const result = catalog.register(vitals());

    expect(result._tag).toBe('Right');
    if (result._tag === 'Right') {
      const bySource = findBySource(result.right, 'heartRate');
      const byTarget = findByTarget(result.right, 'note');
      expect(O.isSome(bySource) && bySource.value.targetField).toBe('heart_rate');
      expect(O.isSome(byTarget) && byTarget.value.sourceField).toBe('note');
      expect(O.isNone(findBySource(result.right, 'missing'))).toBe(true);
    }
  });
});
