// Re-export all schema tables
export * from './runs.js';
export * from './snapshots.js';
