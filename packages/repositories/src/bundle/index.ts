// Run bundles - experiment runs stored as a directory of JSON and NDJSON files

export * from './types.js';
export * from './fs.js';
export * from './repositories.js';
