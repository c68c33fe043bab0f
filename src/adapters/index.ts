/**
 * Export all adapters
 */

export * from './storage';
export * from './extraction';
export * from './target-store';
export * from './review-queue';
export * from './sampling';
