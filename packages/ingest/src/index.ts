/**
 * Ingest pipeline: coordinator, catch-up scanner and directory watcher
 */

export * from './quiescence.js';
export * from './metadata.js';
export * from './coordinator.js';
export * from './scanner.js';
export * from './watcher.js';
export * from './context.js';
