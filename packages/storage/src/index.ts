/**
 * Durable storage for the ingest pipeline: TSV tables, the dedup store,
 * per-resource locks, in-flight guards and extraction stamps
 */

export * from './fs-utils.js';
export * from './locks.js';
export * from './layout.js';
export * from './objects-table.js';
export * from './ledger-table.js';
export * from './hash-counts.js';
export * from './dedup-store.js';
export * from './inflight.js';
export * from './stamp.js';
