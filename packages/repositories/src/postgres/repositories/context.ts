import type { Database } from '../db.js';
import type { RepositoryContext } from '../../interfaces/index.js';
import { PgRunRepository } from './run-repository.js';
import { PgSnapshotRepository } from './snapshot-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return {
    runs: new PgRunRepository(db),
    snapshots: new PgSnapshotRepository(db),
  };
}
