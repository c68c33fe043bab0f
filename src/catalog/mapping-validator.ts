/**
 * Dry run of a schema mapping
 *
 * Checks type compatibility, defaults, transform and merge names and
 * validation rules, then transforms any sample records through the mapping.
 */

import { pipe } from 'fp-ts/function';
import * as E from 'fp-ts/Either';
import type { Either } from 'fp-ts/Either';
import type { DataRecord, FieldMapping, FieldType, SchemaMapping, SchemaMappingInput } from '../types/base';
import type { ValidationError } from '../types/errors';
import { SchemaMappingInputCodec, validate } from '../types/schemas';
import { toSyncError } from '../errors/handler';
import type { TransformRegistry } from '../transform/coercion';
import { coerce, findTransform, transformNames } from '../transform/coercion';
import { transformRecord } from '../transform/engine';
import type { MergeRegistry } from '../sync/merge';
import { findMerge } from '../sync/merge';
import { checkUniqueFields } from './schema-catalog';

export type Compatibility = 'exact' | 'lossy' | 'incompatible';

export type MappingIssueCode =
  | 'incompatible-types'
  | 'lossy-conversion'
  | 'invalid-default'
  | 'unknown-transform'
  | 'unknown-merge'
  | 'invalid-pattern'
  | 'unmapped-validation-field'
  | 'sample-failed';

export interface MappingIssue {
  readonly code: MappingIssueCode;
  readonly severity: 'error' | 'warning';
  readonly path: string;
  readonly message: string;
  readonly resourceId?: string;
}

export interface MappingReport {
  readonly valid: boolean;
  readonly issues: ReadonlyArray<MappingIssue>;
  readonly samplesChecked: number;
  readonly samplesPassed: number;
}

export interface MappingCheckOptions {
  readonly transforms?: TransformRegistry;
  readonly merges?: MergeRegistry;
  readonly samples?: ReadonlyArray<DataRecord>;
}

const TEXT: ReadonlyArray<FieldType> = ['string', 'code'];
const NUMERIC: ReadonlyArray<FieldType> = ['integer', 'decimal'];
const TEMPORAL: ReadonlyArray<FieldType> = ['date', 'datetime'];
const STRUCTURED: ReadonlyArray<FieldType> = ['list', 'object'];

// Whether a value read as `from` can always, sometimes or never be coerced to `to`
export const compatibility = (from: FieldType, to: FieldType): Compatibility => {
  if (from === to) {
    return 'exact';
  }
  if (STRUCTURED.includes(from) || STRUCTURED.includes(to)) {
    return 'incompatible';
  }
  if (TEXT.includes(to)) {
    // Blank strings are not codes
    return from === 'string' ? 'lossy' : 'exact';
  }
  if (TEXT.includes(from)) {
    return 'lossy';
  }
  if (NUMERIC.includes(from)) {
    return to === 'decimal' ? 'exact' : 'lossy';
  }
  if (TEMPORAL.includes(from)) {
    return to === 'datetime' ? 'exact' : to === 'date' ? 'lossy' : 'incompatible';
  }
  // boolean
  return 'incompatible';
};

const fieldIssues = (
  mapping: FieldMapping,
  index: number,
  options: MappingCheckOptions,
): ReadonlyArray<MappingIssue> => {
  const path = `fieldMappings.${index}`;
  const issues: MappingIssue[] = [];

  if (mapping.transform === undefined) {
    const fit = compatibility(mapping.sourceType, mapping.targetType);
    if (fit !== 'exact') {
      issues.push({
        code: fit === 'lossy' ? 'lossy-conversion' : 'incompatible-types',
        severity: fit === 'lossy' ? 'warning' : 'error',
        path,
        message: `${mapping.sourceField}: ${mapping.sourceType} -> ${mapping.targetType} is ${fit}`,
      });
    }
  } else {
    transformNames(mapping.transform)
      .filter((name) => findTransform(name, options.transforms ?? {}) === undefined)
      .forEach((name) =>
        issues.push({
          code: 'unknown-transform',
          severity: 'error',
          path: `${path}.transform`,
          message: `Unknown transform "${name}"`,
        }),
      );
  }

  if (mapping.defaultValue !== undefined) {
    const defaulted = coerce(mapping.defaultValue, mapping.targetType);
    if (E.isLeft(defaulted)) {
      issues.push({ code: 'invalid-default', severity: 'error', path: `${path}.defaultValue`, message: defaulted.left });
    }
  }

  if (mapping.merge !== undefined && findMerge(mapping.merge, options.merges) === undefined) {
    issues.push({
      code: 'unknown-merge',
      severity: 'error',
      path: `${path}.merge`,
      message: `Merge function "${mapping.merge}" is not registered`,
    });
  }

  return issues;
};

const validationIssues = (input: SchemaMappingInput): ReadonlyArray<MappingIssue> => {
  const targets = new Set(input.fieldMappings.map((m) => m.targetField));
  return (input.validations ?? []).flatMap((validation, index): ReadonlyArray<MappingIssue> => {
    const path = `validations.${index}`;
    const issues: MappingIssue[] = [];
    if (!targets.has(validation.field)) {
      issues.push({
        code: 'unmapped-validation-field',
        severity: 'warning',
        path,
        message: `${validation.field} is not a target field`,
      });
    }
    if (validation.type === 'pattern') {
      const compiled = E.tryCatch(
        () => new RegExp(validation.pattern),
        (error) => toSyncError(error).message,
      );
      if (E.isLeft(compiled)) {
        issues.push({ code: 'invalid-pattern', severity: 'error', path: `${path}.pattern`, message: compiled.left });
      }
    }
    return issues;
  });
};

const sampleIssues = (
  mapping: SchemaMapping,
  samples: ReadonlyArray<DataRecord>,
  transforms: TransformRegistry,
): ReadonlyArray<MappingIssue> =>
  samples.flatMap((sample): ReadonlyArray<MappingIssue> =>
    pipe(
      E.tryCatch(() => transformRecord(sample, mapping, transforms), toSyncError),
      E.chainW((transformed) => transformed),
      E.match(
        (error): ReadonlyArray<MappingIssue> => [
          {
            code: 'sample-failed',
            severity: 'error',
            path: error.context?.field ?? '',
            message: error.message,
            resourceId: sample.resourceId,
          },
        ],
        (): ReadonlyArray<MappingIssue> => [],
      ),
    ),
  );

/**
 * Report on a mapping without registering it.
 * Malformed input is a Left; everything else lands in the report.
 */
export const validateMapping = (
  input: SchemaMappingInput,
  options: MappingCheckOptions = {},
): Either<ValidationError, MappingReport> =>
  pipe(
    validate(SchemaMappingInputCodec, 'SchemaMapping')(input),
    E.chain(() => checkUniqueFields(input)),
    E.map((valid) => {
      const samples = options.samples ?? [];
      const dryRun: SchemaMapping = {
        ...valid,
        validations: valid.validations ?? [],
        version: 0,
        createdAt: 0,
      };
      const failedSamples = sampleIssues(dryRun, samples, options.transforms ?? {});
      const issues = [
        ...valid.fieldMappings.flatMap((mapping, index) => fieldIssues(mapping, index, options)),
        ...validationIssues(valid),
        ...failedSamples,
      ];
      return {
        valid: issues.every((issue) => issue.severity !== 'error'),
        issues,
        samplesChecked: samples.length,
        samplesPassed: samples.length - failedSamples.length,
      };
    }),
  );
