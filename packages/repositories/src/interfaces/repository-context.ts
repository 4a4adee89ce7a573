import type { RunRepository } from './run-repository.js';
import type { SnapshotRepository } from './snapshot-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the dependency injection point for the runtime: the scheduler's
 * save sinks and the CLI take a RepositoryContext, so any implementation
 * (Postgres, bundle directory, in-memory) can be swapped in.
 *
 * Example usage:
 * ```typescript
 * const repos = createBundleRepositoryContext('./results');
 * const run = await repos.runs.create({ name: 'Henon sweep' });
 * ```
 */
export interface RepositoryContext {
  readonly runs: RunRepository;
  readonly snapshots: SnapshotRepository;
}

/**
 * Factory type for creating a RepositoryContext.
 * Implementations can use this to provide their own initialization logic.
 */
export type RepositoryContextFactory<TConfig = unknown> = (
  config: TConfig
) => RepositoryContext | Promise<RepositoryContext>;
