// Re-export all protocol types

export * from './common.js';
export * from './runcard.js';
export * from './variables.js';
export * from './alarms.js';
export * from './routines.js';
export * from './snapshots.js';
export * from './runs.js';
