/**
 * Export sync components
 */

export * from './coordinator';
export {
  type ConflictResolver,
  type CustomOutcome,
  type CustomResolver,
  type CustomResolverRegistry,
  type ResolverOptions,
  type ResourceResolution,
  type Side,
  createConflictResolver,
  resolveConflicts,
  resolveResource,
  selectRule,
  summarizePatterns,
} from './conflict-resolver';
export {
  type ConflictDetectionOptions,
  type ConflictDetector,
  DEFAULT_CLOCK_SKEW_TOLERANCE_MS,
  conflictIdFor,
  createConflictDetector,
  detectConflicts,
  severityAtLeast,
} from './conflict-detector';
export { type MergeFn, type MergeRegistry, builtinMerges, findMerge } from './merge';
export { activeFilters, createRecordFilter, matchesFilter } from './filter';
export { canTransition, isTerminal, transition } from './run-state';
