// In-memory repository implementations for development and testing
//
// Useful for dry runs of a runcard, fast unit tests and the CLI's
// `--store memory` option. Data does not persist between restarts.

import type { ExperimentRun, StoredSnapshot } from '@runcard/protocol';
import type {
  RepositoryContext,
  RunRepository,
  SnapshotRepository,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  runs: Map<string, ExperimentRun>;
  snapshots: Map<string, StoredSnapshot[]>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends RepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

function page<T>(items: T[], options?: { limit?: number; offset?: number }): T[] {
  const offset = options?.offset ?? 0;
  return options?.limit === undefined ? items.slice(offset) : items.slice(offset, offset + options.limit);
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * const run = await repos.runs.create({ name: 'Henon sweep' });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.snapshots.get(run.id)?.length);
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const runs = new Map<string, ExperimentRun>();
  const snapshots = new Map<string, StoredSnapshot[]>();

  const runRepo: RunRepository = {
    async create(input) {
      const id = input.id ?? `run-${runs.size + 1}`;
      if (runs.has(id)) {
        throw new Error(`Run already exists: ${id}`);
      }
      const run: ExperimentRun = {
        id,
        name: input.name,
        description: input.description ?? {},
        runcardPath: input.runcardPath,
        status: 'running',
        ticks: 0,
        startedAt: input.startedAt ?? new Date().toISOString(),
      };
      runs.set(id, run);
      return { ...run };
    },
    async get(id) {
      const run = runs.get(id);
      return run ? { ...run } : null;
    },
    async list(filter) {
      let result = Array.from(runs.values());
      if (filter?.status) {
        result = result.filter((run) => run.status === filter.status);
      }
      result.sort((a, b) => b.startedAt.localeCompare(a.startedAt));
      return page(result, filter).map((run) => ({ ...run }));
    },
    async updateStatus(id, input) {
      const run = runs.get(id);
      if (!run) return null;
      run.status = input.status;
      if (input.reason !== undefined) run.reason = input.reason;
      if (input.ticks !== undefined) run.ticks = input.ticks;
      if (input.endedAt !== undefined) run.endedAt = input.endedAt;
      return { ...run };
    },
  };

  const snapshotRepo: SnapshotRepository = {
    async append(snapshot) {
      const log = snapshots.get(snapshot.runId) ?? [];
      log.push(snapshot);
      snapshots.set(snapshot.runId, log);
      return snapshot;
    },
    async list(runId, options) {
      return page(snapshots.get(runId) ?? [], options);
    },
    async count(runId) {
      return snapshots.get(runId)?.length ?? 0;
    },
    async latest(runId) {
      const log = snapshots.get(runId) ?? [];
      return log.length > 0 ? log[log.length - 1] : null;
    },
    async *stream(runId) {
      yield* snapshots.get(runId) ?? [];
    },
  };

  return {
    runs: runRepo,
    snapshots: snapshotRepo,
    _data: { runs, snapshots },
    clear() {
      runs.clear();
      snapshots.clear();
    },
  };
}
