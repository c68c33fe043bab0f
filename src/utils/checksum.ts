/**
 * Canonical JSON and checksums over field values
 */

import { createHash } from 'node:crypto';
import type { FieldValue } from '../types/base';

const isFieldObject = (value: FieldValue): value is { readonly [key: string]: FieldValue } =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// JSON with object keys sorted at every level
export const canonicalJson = (value: FieldValue): string => {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (isFieldObject(value)) {
    const body = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key] ?? null)}`)
      .join(',');
    return `{${body}}`;
  }
  return JSON.stringify(value);
};

export const valuesEqual = (a: FieldValue, b: FieldValue): boolean =>
  canonicalJson(a) === canonicalJson(b);

export const checksum = (value: FieldValue): string =>
  createHash('sha256').update(canonicalJson(value)).digest('hex');
