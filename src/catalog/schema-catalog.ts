/**
 * Versioned schema mappings per system pair and resource type
 */

import { pipe } from 'fp-ts/function';
import * as E from 'fp-ts/Either';
import * as O from 'fp-ts/Option';
import type { Either } from 'fp-ts/Either';
import type { Option } from 'fp-ts/Option';
import type {
  FieldMapping,
  SchemaMapping,
  SchemaMappingInput,
  SystemPair,
} from '../types/base';
import type { ValidationDetail, ValidationError } from '../types/errors';
import { validationError } from '../types/errors';
import { SchemaMappingInputCodec, validate } from '../types/schemas';

export interface RegisterOptions {
  readonly activate?: boolean;
}

export interface SchemaCatalog {
  readonly register: (
    input: SchemaMappingInput,
    options?: RegisterOptions,
  ) => Either<ValidationError, SchemaMapping>;
  readonly activate: (
    pair: SystemPair,
    resourceType: string,
    version: number,
  ) => Either<ValidationError, SchemaMapping>;
  readonly getActive: (pair: SystemPair, resourceType: string) => Option<SchemaMapping>;
  readonly getVersion: (
    pair: SystemPair,
    resourceType: string,
    version: number,
  ) => Option<SchemaMapping>;
  readonly history: (pair: SystemPair, resourceType: string) => ReadonlyArray<SchemaMapping>;
}

interface CatalogEntry {
  readonly versions: ReadonlyArray<SchemaMapping>;
  readonly active: number;
}

const catalogKey = (pair: SystemPair, resourceType: string): string =>
  `${pair.sourceSystem}|${pair.targetSystem}|${resourceType}`;

const duplicates = (
  mappings: ReadonlyArray<FieldMapping>,
  select: (mapping: FieldMapping) => string,
  label: string,
): ReadonlyArray<ValidationDetail> => {
  const seen = new Set<string>();
  const details: ValidationDetail[] = [];
  mappings.forEach((mapping, index) => {
    const name = select(mapping);
    if (seen.has(name)) {
      details.push({
        path: `fieldMappings.${index}.${label}`,
        message: `${label} "${name}" is mapped more than once`,
      });
    }
    seen.add(name);
  });
  return details;
};

export const checkUniqueFields = (
  input: SchemaMappingInput,
): Either<ValidationError, SchemaMappingInput> => {
  const details = [
    ...duplicates(input.fieldMappings, (m) => m.sourceField, 'sourceField'),
    ...duplicates(input.fieldMappings, (m) => m.targetField, 'targetField'),
  ];
  return details.length === 0
    ? E.right(input)
    : E.left(validationError('Schema mapping has duplicate fields', details));
};

const freeze = (mapping: SchemaMapping): SchemaMapping =>
  Object.freeze({
    ...mapping,
    fieldMappings: Object.freeze(mapping.fieldMappings.map((m) => Object.freeze({ ...m }))),
    validations: Object.freeze(mapping.validations.map((v) => Object.freeze({ ...v }))),
  });

// Field lookups within a single mapping version
export const findBySource = (
  mapping: SchemaMapping,
  sourceField: string,
): Option<FieldMapping> =>
  O.fromNullable(mapping.fieldMappings.find((m) => m.sourceField === sourceField));

export const findByTarget = (
  mapping: SchemaMapping,
  targetField: string,
): Option<FieldMapping> =>
  O.fromNullable(mapping.fieldMappings.find((m) => m.targetField === targetField));

export const createSchemaCatalog = (now: () => number = Date.now): SchemaCatalog => {
  const entries = new Map<string, CatalogEntry>();

  const register = (
    input: SchemaMappingInput,
    options: RegisterOptions = {},
  ): Either<ValidationError, SchemaMapping> =>
    pipe(
      validate(SchemaMappingInputCodec, 'SchemaMapping')(input),
      E.chain(() => checkUniqueFields(input)),
      E.map((valid) => {
        const key = catalogKey(valid, valid.resourceType);
        const entry = entries.get(key);
        const previous = entry?.versions ?? [];
        const mapping = freeze({
          sourceSystem: valid.sourceSystem,
          targetSystem: valid.targetSystem,
          resourceType: valid.resourceType,
          fieldMappings: valid.fieldMappings,
          validations: valid.validations ?? [],
          version: previous.length + 1,
          createdAt: now(),
        });
        const shouldActivate = options.activate ?? true;
        entries.set(key, {
          versions: [...previous, mapping],
          active: shouldActivate || entry === undefined ? mapping.version : entry.active,
        });
        return mapping;
      }),
    );

  const getVersion = (
    pair: SystemPair,
    resourceType: string,
    version: number,
  ): Option<SchemaMapping> =>
    pipe(
      O.fromNullable(entries.get(catalogKey(pair, resourceType))),
      O.chain((entry) => O.fromNullable(entry.versions[version - 1])),
    );

  const activate = (
    pair: SystemPair,
    resourceType: string,
    version: number,
  ): Either<ValidationError, SchemaMapping> => {
    const key = catalogKey(pair, resourceType);
    return pipe(
      getVersion(pair, resourceType, version),
      E.fromOption(() =>
        validationError(`No mapping version ${version} for ${key}`, [
          { path: 'version', message: `unknown version ${version}` },
        ]),
      ),
      E.map((mapping) => {
        const entry = entries.get(key);
        if (entry !== undefined) {
          entries.set(key, { ...entry, active: mapping.version });
        }
        return mapping;
      }),
    );
  };

  const getActive = (pair: SystemPair, resourceType: string): Option<SchemaMapping> =>
    pipe(
      O.fromNullable(entries.get(catalogKey(pair, resourceType))),
      O.chain((entry) => getVersion(pair, resourceType, entry.active)),
    );

  const history = (pair: SystemPair, resourceType: string): ReadonlyArray<SchemaMapping> =>
    entries.get(catalogKey(pair, resourceType))?.versions ?? [];

  return {
    register,
    activate,
    getActive,
    getVersion,
    history,
  };
};
