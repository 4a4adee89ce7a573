import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;

  /**
   * Pool size (default 4)
   */
  maxConnections?: number;

  /**
   * Seconds before an idle connection is closed
   */
  idleTimeout?: number;
};

/**
 * Connect to the run store and wrap it in Drizzle.
 *
 * Usage:
 * ```ts
 * const database = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(database.db);
 * // ... run experiments ...
 * await database.close();
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 4,
    idle_timeout: config.idleTimeout ?? 30,
  });

  const db = drizzle(client, { schema });

  return {
    db,
    client,
    close: () => client.end(),
  };
}

export type Database = ReturnType<typeof createDatabase>['db'];
