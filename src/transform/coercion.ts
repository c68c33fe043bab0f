/**
 * Field reads, named transforms and type coercion
 */

import { pipe } from 'fp-ts/function';
import * as E from 'fp-ts/Either';
import type { Either } from 'fp-ts/Either';
import type { FieldMap, FieldType, FieldValue, ReadonlyRecord } from '../types/base';

export type TransformFn = (value: FieldValue) => Either<string, FieldValue>;

export type TransformRegistry = ReadonlyRecord<string, TransformFn>;

export const isFieldObject = (
  value: FieldValue | undefined,
): value is { readonly [key: string]: FieldValue } =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Dotted path read over own keys only; null counts as absent
export const readPath = (fields: FieldMap, path: string): FieldValue | undefined => {
  let current: FieldValue | undefined = fields;
  for (const segment of path.split('.')) {
    if (!isFieldObject(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current === null ? undefined : current;
};

const kindOf = (value: FieldValue): string =>
  Array.isArray(value) ? 'list' : value === null ? 'null' : typeof value;

const stringOnly =
  (name: string, f: (s: string) => FieldValue): TransformFn =>
  (value) =>
    typeof value === 'string'
      ? E.right(f(value))
      : E.left(`${name} expects a string, got ${kindOf(value)}`);

export const builtinTransforms: TransformRegistry = {
  trim: stringOnly('trim', (s) => s.trim()),
  lowercase: stringOnly('lowercase', (s) => s.toLowerCase()),
  uppercase: stringOnly('uppercase', (s) => s.toUpperCase()),
  normalizeWhitespace: stringOnly('normalizeWhitespace', (s) => s.trim().replace(/\s+/g, ' ')),
  splitComma: stringOnly('splitComma', (s) =>
    s
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0),
  ),
  toString: (value: FieldValue) =>
    typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
      ? E.right(String(value))
      : E.left(`toString expects a scalar, got ${kindOf(value)}`),
  parseNumber: (value) => {
    if (typeof value === 'number') {
      return E.right(value);
    }
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
      return E.right(Number(value));
    }
    return E.left(`parseNumber cannot read ${JSON.stringify(value)}`);
  },
};

const lookup = (registry: TransformRegistry, name: string): TransformFn | undefined =>
  Object.hasOwn(registry, name) ? registry[name] : undefined;

export const findTransform = (name: string, registry: TransformRegistry): TransformFn | undefined =>
  lookup(registry, name) ?? lookup(builtinTransforms, name);

export const transformNames = (expression: string): ReadonlyArray<string> =>
  expression
    .split('|')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

// Apply a transform expression such as "trim|lowercase"
export const applyTransform = (
  expression: string,
  value: FieldValue,
  registry: TransformRegistry,
): Either<string, FieldValue> =>
  transformNames(expression).reduce<Either<string, FieldValue>>(
    (acc, name) =>
      pipe(
        acc,
        E.chain((current) => {
          const fn = findTransform(name, registry);
          return fn === undefined ? E.left(`Unknown transform "${name}"`) : fn(current);
        }),
      ),
    E.right(value),
  );

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const toDate = (value: FieldValue): Date | undefined => {
  const time =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim() !== ''
        ? Date.parse(value.trim())
        : Number.NaN;
  const date = new Date(time);
  // Out of range times such as 1e17 give an invalid date
  return Number.isNaN(date.getTime()) ? undefined : date;
};

const mismatch = (value: FieldValue, type: FieldType): Either<string, FieldValue> =>
  E.left(`Cannot coerce ${JSON.stringify(value)} to ${type}`);

// Coerce a value to a field type
export const coerce = (value: FieldValue, type: FieldType): Either<string, FieldValue> => {
  switch (type) {
    case 'string':
    case 'code': {
      if (typeof value === 'string') {
        return type === 'code' && value.trim() === '' ? mismatch(value, type) : E.right(value);
      }
      return typeof value === 'number' || typeof value === 'boolean'
        ? E.right(String(value))
        : mismatch(value, type);
    }
    case 'integer': {
      if (typeof value === 'number') {
        return Number.isInteger(value) ? E.right(value) : mismatch(value, type);
      }
      return typeof value === 'string' && INTEGER.test(value.trim())
        ? E.right(Number(value.trim()))
        : mismatch(value, type);
    }
    case 'decimal': {
      if (typeof value === 'number') {
        return Number.isFinite(value) ? E.right(value) : mismatch(value, type);
      }
      return typeof value === 'string' && DECIMAL.test(value.trim())
        ? E.right(Number(value.trim()))
        : mismatch(value, type);
    }
    case 'boolean': {
      if (typeof value === 'boolean') {
        return E.right(value);
      }
      if (value === 1 || value === 0) {
        return E.right(value === 1);
      }
      if (typeof value === 'string') {
        const lowered = value.trim().toLowerCase();
        if (lowered === 'true' || lowered === 'false') {
          return E.right(lowered === 'true');
        }
      }
      return mismatch(value, type);
    }
    case 'date':
    case 'datetime': {
      const date = toDate(value);
      if (date === undefined) {
        return mismatch(value, type);
      }
      const iso = date.toISOString();
      return E.right(type === 'date' ? iso.slice(0, 10) : iso);
    }
    case 'list':
      return Array.isArray(value) ? E.right(value) : mismatch(value, type);
    case 'object':
      return isFieldObject(value) ? E.right(value) : mismatch(value, type);
  }
};

// A value already in the canonical shape of its type
export const conformsTo = (value: FieldValue, type: FieldType): boolean =>
  pipe(
    coerce(value, type),
    E.exists((coerced) => typeof coerced === 'object' || coerced === value),
  );
