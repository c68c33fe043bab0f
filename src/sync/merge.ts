/**
 * Per-type merge functions for mergeable fields
 */

import * as E from 'fp-ts/Either';
import type { Either } from 'fp-ts/Either';
import type { FieldValue, ReadonlyRecord } from '../types';
import { isFieldObject } from '../transform/coercion';
import { canonicalJson, valuesEqual } from '../utils/checksum';

export type MergeFn = (source: FieldValue, target: FieldValue) => Either<string, FieldValue>;

export type MergeRegistry = ReadonlyRecord<string, MergeFn>;

const dedupe = (items: ReadonlyArray<FieldValue>): ReadonlyArray<FieldValue> => {
  const seen = new Set<string>();
  return items.filter((item) => {
    const key = canonicalJson(item);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
};

// Set-typed lists: union in canonical order
export const union: MergeFn = (source, target) => {
  if (!Array.isArray(source) || !Array.isArray(target)) {
    return E.left('union merge needs two lists');
  }
  const merged = dedupe([...target, ...source]);
  return E.right(
    [...merged].sort((a, b) => {
      const left = canonicalJson(a);
      const right = canonicalJson(b);
      return left < right ? -1 : left > right ? 1 : 0;
    }),
  );
};

// Ordered lists: keep target order, then new source items
export const appendUnique: MergeFn = (source, target) => {
  if (!Array.isArray(source) || !Array.isArray(target)) {
    return E.left('appendUnique merge needs two lists');
  }
  return E.right(dedupe([...target, ...source]));
};

// Nested objects: key union; shared keys must agree
export const objectKeys: MergeFn = (source, target) => {
  if (!isFieldObject(source) || !isFieldObject(target)) {
    return E.left('objectKeys merge needs two objects');
  }
  const collisions = Object.keys(source).filter(
    (key) => key in target && !valuesEqual(source[key] ?? null, target[key] ?? null),
  );
  if (collisions.length > 0) {
    return E.left(`objectKeys merge found differing values for ${collisions.join(', ')}`);
  }
  return E.right({ ...target, ...source });
};

export const builtinMerges: MergeRegistry = {
  union,
  appendUnique,
  objectKeys,
};

// Registered merges shadow the built-in ones of the same name
export const findMerge = (name: string, registry: MergeRegistry = {}): MergeFn | undefined =>
  Object.hasOwn(registry, name)
    ? registry[name]
    : Object.hasOwn(builtinMerges, name)
      ? builtinMerges[name]
      : undefined;
