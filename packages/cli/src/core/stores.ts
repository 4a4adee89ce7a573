/**
 * Run stores - where the CLI records runs and saved snapshots
 */

import { resolve } from 'node:path';
import {
  bundle,
  createInMemoryRepositoryContext,
  postgres,
  type RepositoryContext,
} from '@runcard/repositories';
import { ValidationError } from '@runcard/runtime';

export type StoreKind = 'memory' | 'bundle' | 'postgres';

export type StoreOptions = {
  store: StoreKind;

  /**
   * Bundle root directory
   */
  output: string;

  databaseUrl?: string;
};

export type OpenStore = {
  kind: StoreKind;
  repositories: RepositoryContext;

  /**
   * Human-readable location, for the run summary
   */
  location: string;

  close(): Promise<void>;
};

export type OpenStoreFn = (options: StoreOptions) => Promise<OpenStore>;

export async function openStore(options: StoreOptions): Promise<OpenStore> {
  switch (options.store) {
    case 'memory':
      return {
        kind: 'memory',
        repositories: createInMemoryRepositoryContext(),
        location: 'memory',
        close: async () => undefined,
      };

    case 'bundle': {
      const root = resolve(options.output);
      return {
        kind: 'bundle',
        repositories: bundle.createBundleRepositoryContext(root),
        location: root,
        close: async () => undefined,
      };
    }

    case 'postgres': {
      if (!options.databaseUrl) {
        throw new ValidationError('--store postgres needs --database-url or DATABASE_URL', {
          field: 'databaseUrl',
        });
      }
      const database = postgres.createDatabase({ connectionString: options.databaseUrl });
      return {
        kind: 'postgres',
        repositories: postgres.createPgRepositoryContext(database.db),
        location: new URL(options.databaseUrl).host,
        close: database.close,
      };
    }

    default: {
      const _exhaustive: never = options.store;
      throw new Error(`Unknown store: ${String(_exhaustive)}`);
    }
  }
}
