/**
 * Main type exports
 */

export * from './backend.js';
export * from './messages.js';
export * from './batches.js';
export * from './models.js';
export * from './log-records.js';
