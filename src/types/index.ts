/**
 * Export all types
 */

export * from './base';
export * from './errors';
export {
  FieldValueCodec,
  FieldMapCodec,
  FieldMappingCodec,
  FieldValidationCodec,
  SchemaMappingInputCodec,
  DataRecordCodec,
  ResolutionStrategyCodec,
  RetryPolicyCodec,
  EngineConfigCodec,
  SyncFilterCodec,
  SynchronizationDataCodec,
  ConflictDataCodec,
  ConsistencyDataCodec,
  validate,
} from './schemas';
