/**
 * EHR Sync Engine
 *
 * Main entry point
 */

export * from './engine';
export * from './types';
export * from './sync';
export * from './adapters';
export * from './core';
export { type SchemaCatalog, type RegisterOptions, createSchemaCatalog } from './catalog/schema-catalog';
export {
  type Compatibility,
  type MappingCheckOptions,
  type MappingIssue,
  type MappingIssueCode,
  type MappingReport,
  compatibility,
  validateMapping,
} from './catalog/mapping-validator';
export { type TransformationEngine, createTransformationEngine, transformRecord } from './transform/engine';
export {
  type TransformFn,
  type TransformRegistry,
  builtinTransforms,
  coerce,
  findTransform,
} from './transform/coercion';
export {
  type ConsistencyAuditor,
  type ConsistencyAuditorDeps,
  createConsistencyAuditor,
  defaultSamplingPolicy,
} from './audit/consistency-auditor';
export { defaultEngineConfig, loadEngineConfigFromEnv, validateEngineConfig } from './config/defaults';
export {
  type LogLevel,
  type Logger,
  consoleLogger,
  defaultRetryPolicy,
  retryWithBackoff,
  withAbortTimeout,
  withTimeout,
} from './errors/handler';

// Export version
export const version = '0.1.0';
