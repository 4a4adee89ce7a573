export { PgRunRepository, rowToRun } from './run-repository.js';
export { PgSnapshotRepository, rowToSnapshot } from './snapshot-repository.js';
export { createPgRepositoryContext } from './context.js';
