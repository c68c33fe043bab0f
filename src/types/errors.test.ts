/**
 * Tests for error types
 */

import { describe, it, expect } from 'vitest';
import {
  validationError,
  missingRequiredField,
  typeMismatch,
  conflictError,
  transientIOError,
  fatalRunError,
  unknownError,
  isSyncError,
  isValidationError,
  isMappingError,
  isConflictError,
  isTransientIOError,
  isFatalRunError,
  isUnknownError,
  type SyncError,
} from './errors';

describe('Error Types', () => {
  describe('Error Constructors', () => {
    it('should create validation error with details', () => {
      const error = validationError('Invalid request', [
        { path: 'providerId', message: 'must be a non-empty string' },
      ]);
      expect(error.type).toBe('validation-error');
      expect(error.details).toEqual([
        { path: 'providerId', message: 'must be a non-empty string' },
      ]);
      expect(error.timestamp).toBeGreaterThan(0);
    });

    it('should create missing required field error with context', () => {
      const error = missingRequiredField('obs-1', 'heartRate');
      expect(error.type).toBe('mapping-error');
      expect(error.reason).toBe('missing-required-field');
      expect(error.message).toBe('Required field "heartRate" is missing');
      expect(error.context).toEqual({ resourceId: 'obs-1', field: 'heartRate' });
    });

    it('should create type mismatch error', () => {
      const error = typeMismatch('obs-1', 'heartRate', 'expected integer');
      expect(error.reason).toBe('type-mismatch');
      expect(error.resourceId).toBe('obs-1');
      expect(error.field).toBe('heartRate');
    });

    it('should create conflict error carrying conflicts', () => {
      const error = conflictError('Merge not possible', []);
      expect(error.type).toBe('conflict-error');
      expect(error.conflicts).toEqual([]);
    });

    it('should create transient io error retryable by default', () => {
      const error = transientIOError('Target unreachable', 'target.get');
      expect(error.type).toBe('transient-io-error');
      expect(error.operation).toBe('target.get');
      expect(error.retryable).toBe(true);
    });

    it('should create fatal run error', () => {
      const error = fatalRunError('Too many failures', 'abort-threshold');
      expect(error.reason).toBe('abort-threshold');
    });

    it('should create unknown error', () => {
      const cause = new Error('boom');
      const error = unknownError('Unexpected', cause);
      expect(error.error).toBe(cause);
    });
  });

  describe('Type Guards', () => {
    const errors: ReadonlyArray<SyncError> = [
      validationError('v', []),
      missingRequiredField('r', 'f'),
      conflictError('c', []),
      transientIOError('t', 'op'),
      fatalRunError('f', 'extraction-failed'),
      unknownError('u', null),
    ];

    it('should match exactly one guard per error', () => {
      const guards = [
        isValidationError,
        isMappingError,
        isConflictError,
        isTransientIOError,
        isFatalRunError,
        isUnknownError,
      ];
      errors.forEach((error, index) => {
        const matches = guards.map((guard) => guard(error));
        expect(matches.filter(Boolean)).toHaveLength(1);
        expect(matches[index]).toBe(true);
      });
    });

    it('should recognise sync errors among unknown values', () => {
      expect(isSyncError(transientIOError('t', 'op'))).toBe(true);
      expect(isSyncError(new Error('plain'))).toBe(false);
      expect(isSyncError({ type: 'network-error', message: 'x', timestamp: 1 })).toBe(false);
      expect(isSyncError(null)).toBe(false);
    });
  });
});
