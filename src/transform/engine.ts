/**
 * Deterministic source-to-target record transformation
 */

import { pipe } from 'fp-ts/function';
import * as E from 'fp-ts/Either';
import type { Either } from 'fp-ts/Either';
import type {
  DataRecord,
  FieldMapping,
  FieldMap,
  FieldValidation,
  FieldValue,
  SchemaMapping,
  TransformedRecord,
  TransformWarning,
} from '../types/base';
import type { MappingError } from '../types/errors';
import { missingRequiredField, typeMismatch } from '../types/errors';
import { checksum } from '../utils/checksum';
import type { TransformRegistry } from './coercion';
import { applyTransform, coerce, readPath } from './coercion';

export interface TransformationEngine {
  readonly transform: (
    record: DataRecord,
    mapping: SchemaMapping,
  ) => Either<MappingError, TransformedRecord>;
}

interface FieldOutput {
  readonly value?: FieldValue;
  readonly warning?: TransformWarning;
}

const mapField = (
  record: DataRecord,
  mapping: FieldMapping,
  registry: TransformRegistry,
): Either<MappingError, FieldOutput> => {
  const raw = readPath(record.fields, mapping.sourceField);
  const mismatch = (message: string) =>
    typeMismatch(record.resourceId, mapping.sourceField, `${mapping.sourceField}: ${message}`);

  if (raw === undefined) {
    if (mapping.defaultValue !== undefined) {
      return pipe(
        coerce(mapping.defaultValue, mapping.targetType),
        E.bimap(mismatch, (value): FieldOutput => ({
          value,
          warning: {
            code: 'defaulted',
            field: mapping.targetField,
            message: `${mapping.sourceField} absent, default used`,
            severity: 'low',
          },
        })),
      );
    }
    return mapping.required
      ? E.left(missingRequiredField(record.resourceId, mapping.sourceField))
      : E.right({});
  }

  return pipe(
    coerce(raw, mapping.sourceType),
    E.chain((value) =>
      mapping.transform === undefined ? E.right(value) : applyTransform(mapping.transform, value, registry),
    ),
    E.chain((value) => coerce(value, mapping.targetType)),
    E.bimap(mismatch, (value) => ({ value })),
  );
};

const failedValidation = (validation: FieldValidation, value: FieldValue): string | undefined => {
  switch (validation.type) {
    case 'range': {
      if (typeof value !== 'number') {
        return undefined;
      }
      if (validation.min !== undefined && value < validation.min) {
        return `${value} is below ${validation.min}`;
      }
      if (validation.max !== undefined && value > validation.max) {
        return `${value} is above ${validation.max}`;
      }
      return undefined;
    }
    case 'length': {
      const length =
        typeof value === 'string' || Array.isArray(value) ? value.length : undefined;
      if (length === undefined) {
        return undefined;
      }
      if (validation.min !== undefined && length < validation.min) {
        return `length ${length} is below ${validation.min}`;
      }
      if (validation.max !== undefined && length > validation.max) {
        return `length ${length} is above ${validation.max}`;
      }
      return undefined;
    }
    case 'pattern':
      return typeof value === 'string' && !new RegExp(validation.pattern).test(value)
        ? `"${value}" does not match ${validation.pattern}`
        : undefined;
  }
};

const validateFields = (
  fields: FieldMap,
  validations: ReadonlyArray<FieldValidation>,
): ReadonlyArray<TransformWarning> =>
  validations.flatMap((validation): ReadonlyArray<TransformWarning> => {
    const value = fields[validation.field];
    const problem = value === undefined ? undefined : failedValidation(validation, value);
    return problem === undefined
      ? []
      : [
          {
            code: 'validation-failed',
            field: validation.field,
            message: problem,
            severity: validation.severity,
          },
        ];
  });

// Pure; identical inputs give identical output
export const transformRecord = (
  record: DataRecord,
  mapping: SchemaMapping,
  registry: TransformRegistry = {},
): Either<MappingError, TransformedRecord> => {
  const build = (fields: FieldMap, warnings: ReadonlyArray<TransformWarning>): TransformedRecord => ({
    resourceType: record.resourceType,
    resourceId: record.resourceId,
    sourceSystem: record.sourceSystem,
    targetSystem: mapping.targetSystem,
    fields,
    updatedAt: record.updatedAt,
    mappingVersion: mapping.version,
    ...(record.deleted === true ? { deleted: true } : {}),
    warnings,
    checksum: checksum(fields),
  });

  if (record.deleted === true) {
    return E.right(build({}, []));
  }

  return pipe(
    mapping.fieldMappings.reduce<
      Either<MappingError, { fields: Record<string, FieldValue>; warnings: TransformWarning[] }>
    >(
      (acc, fieldMapping) =>
        pipe(
          acc,
          E.chain((state) =>
            pipe(
              mapField(record, fieldMapping, registry),
              E.map((output) => {
                if (output.value !== undefined) {
                  state.fields[fieldMapping.targetField] = output.value;
                }
                if (output.warning !== undefined) {
                  state.warnings.push(output.warning);
                }
                return state;
              }),
            ),
          ),
        ),
      E.right({ fields: {}, warnings: [] }),
    ),
    E.map(({ fields, warnings }) =>
      build(fields, [...warnings, ...validateFields(fields, mapping.validations)]),
    ),
  );
};

export const createTransformationEngine = (
  registry: TransformRegistry = {},
): TransformationEngine => ({
  transform: (record, mapping) => transformRecord(record, mapping, registry),
});
