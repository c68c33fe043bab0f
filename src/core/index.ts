/**
 * Export core components
 */

export * from './sync-ledger';
