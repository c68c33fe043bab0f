/**
 * Field filters for selective sync
 */

import type { DataRecord, FieldMap, FieldValue, SyncFilter } from '../types';
import { readPath } from '../transform/coercion';
import { valuesEqual } from '../utils/checksum';

type FilterValue = SyncFilter['value'];

const compare = (actual: FieldValue, expected: FilterValue): number | undefined => {
  if (typeof actual === 'number' && typeof expected === 'number') {
    return actual - expected;
  }
  if (typeof actual === 'string' && typeof expected === 'string') {
    return actual < expected ? -1 : actual > expected ? 1 : 0;
  }
  return undefined;
};

const contains = (actual: FieldValue, expected: FilterValue): boolean => {
  if (typeof actual === 'string') {
    return actual.includes(String(expected));
  }
  if (Array.isArray(actual)) {
    return actual.some((item) => valuesEqual(item, expected));
  }
  return false;
};

// Absent fields only satisfy the negative operators
export const matchesFilter = (fields: FieldMap, filter: SyncFilter): boolean => {
  const actual = readPath(fields, filter.field);
  if (actual === undefined) {
    return filter.operator === 'notEquals' || filter.operator === 'notContains';
  }

  switch (filter.operator) {
    case 'equals':
      return valuesEqual(actual, filter.value);
    case 'notEquals':
      return !valuesEqual(actual, filter.value);
    case 'greaterThan': {
      const order = compare(actual, filter.value);
      return order !== undefined && order > 0;
    }
    case 'lessThan': {
      const order = compare(actual, filter.value);
      return order !== undefined && order < 0;
    }
    case 'contains':
      return contains(actual, filter.value);
    case 'notContains':
      return !contains(actual, filter.value);
    case 'startsWith':
      return typeof actual === 'string' && actual.startsWith(String(filter.value));
    case 'endsWith':
      return typeof actual === 'string' && actual.endsWith(String(filter.value));
  }
};

export const activeFilters = (filters: ReadonlyArray<SyncFilter>): ReadonlyArray<SyncFilter> =>
  filters.filter((filter) => filter.isActive !== false);

// Create record filter; every active filter must match
export const createRecordFilter = (
  filters: ReadonlyArray<SyncFilter>,
): ((record: DataRecord) => boolean) => {
  const active = activeFilters(filters);
  return (record) =>
    record.deleted === true || active.every((filter) => matchesFilter(record.fields, filter));
};
