/**
 * Error types for sync operations
 */

import type { DataConflict } from './base';

// Base error interface
interface BaseError {
  readonly message: string;
  readonly timestamp: number;
  readonly context?: ErrorContext;
}

export interface ErrorContext {
  readonly resourceId?: string;
  readonly field?: string;
  readonly [key: string]: unknown;
}

// Malformed request or configuration
export interface ValidationError extends BaseError {
  readonly type: 'validation-error';
  readonly details: ReadonlyArray<ValidationDetail>;
}

export interface ValidationDetail {
  readonly path: string;
  readonly message: string;
}

export type MappingFailure = 'missing-required-field' | 'type-mismatch';

// Per-record transformation failure
export interface MappingError extends BaseError {
  readonly type: 'mapping-error';
  readonly reason: MappingFailure;
  readonly resourceId: string;
  readonly field: string;
}

// Conflicts that could not be resolved automatically
export interface ConflictError extends BaseError {
  readonly type: 'conflict-error';
  readonly conflicts: ReadonlyArray<DataConflict>;
}

// Extraction or target store unreachable
export interface TransientIOError extends BaseError {
  readonly type: 'transient-io-error';
  readonly operation: string;
  readonly retryable: boolean;
}

// Terminates the whole run
export interface FatalRunError extends BaseError {
  readonly type: 'fatal-run-error';
  readonly reason: 'abort-threshold' | 'missing-configuration' | 'extraction-failed';
}

// Unknown error
export interface UnknownError extends BaseError {
  readonly type: 'unknown-error';
  readonly error: unknown;
}

// Union type for all sync errors
export type SyncError =
  | ValidationError
  | MappingError
  | ConflictError
  | TransientIOError
  | FatalRunError
  | UnknownError;

const SYNC_ERROR_TYPES: ReadonlyArray<SyncError['type']> = [
  'validation-error',
  'mapping-error',
  'conflict-error',
  'transient-io-error',
  'fatal-run-error',
  'unknown-error',
];

// Type guards
export const isSyncError = (value: unknown): value is SyncError => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('type' in value) || !('message' in value) || !('timestamp' in value)) {
    return false;
  }
  const tag = value.type;
  return SYNC_ERROR_TYPES.some((type) => type === tag);
};

export const isValidationError = (error: SyncError): error is ValidationError =>
  error.type === 'validation-error';

export const isMappingError = (error: SyncError): error is MappingError =>
  error.type === 'mapping-error';

export const isConflictError = (error: SyncError): error is ConflictError =>
  error.type === 'conflict-error';

export const isTransientIOError = (error: SyncError): error is TransientIOError =>
  error.type === 'transient-io-error';

export const isFatalRunError = (error: SyncError): error is FatalRunError =>
  error.type === 'fatal-run-error';

export const isUnknownError = (error: SyncError): error is UnknownError =>
  error.type === 'unknown-error';

// Error constructors
export const validationError = (
  message: string,
  details: ReadonlyArray<ValidationDetail>,
  context?: ErrorContext,
): ValidationError => ({
  type: 'validation-error',
  message,
  details,
  timestamp: Date.now(),
  context,
});

export const missingRequiredField = (
  resourceId: string,
  field: string,
): MappingError => ({
  type: 'mapping-error',
  reason: 'missing-required-field',
  message: `Required field "${field}" is missing`,
  resourceId,
  field,
  timestamp: Date.now(),
  context: { resourceId, field },
});

export const typeMismatch = (
  resourceId: string,
  field: string,
  message: string,
): MappingError => ({
  type: 'mapping-error',
  reason: 'type-mismatch',
  message,
  resourceId,
  field,
  timestamp: Date.now(),
  context: { resourceId, field },
});

export const conflictError = (
  message: string,
  conflicts: ReadonlyArray<DataConflict>,
  context?: ErrorContext,
): ConflictError => ({
  type: 'conflict-error',
  message,
  conflicts,
  timestamp: Date.now(),
  context,
});

export const transientIOError = (
  message: string,
  operation: string,
  retryable = true,
  context?: ErrorContext,
): TransientIOError => ({
  type: 'transient-io-error',
  message,
  operation,
  retryable,
  timestamp: Date.now(),
  context,
});

export const fatalRunError = (
  message: string,
  reason: FatalRunError['reason'],
  context?: ErrorContext,
): FatalRunError => ({
  type: 'fatal-run-error',
  message,
  reason,
  timestamp: Date.now(),
  context,
});

export const unknownError = (
  message: string,
  error: unknown,
  context?: ErrorContext,
): UnknownError => ({
  type: 'unknown-error',
  message,
  error,
  timestamp: Date.now(),
  context,
});
