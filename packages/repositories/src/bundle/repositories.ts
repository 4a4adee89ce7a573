// Bundle repositories - experiment runs stored as plain files
//
//   runs/<id>/run.json          the run record, rewritten on every update
//   runs/<id>/snapshots.ndjson  one snapshot per line, append-only

import {
  BUNDLE_DIRS,
  parseNdjson,
  runRecordPath,
  snapshotsLogPath,
  stringifyNdjsonLine,
  type ExperimentRun,
  type Id,
  type StoredSnapshot,
} from '@runcard/protocol';
import type {
  CreateRunInput,
  RepositoryContext,
  RunFilter,
  RunRepository,
  SnapshotListOptions,
  SnapshotRepository,
  UpdateRunStatusInput,
} from '../interfaces/index.js';
import type { BundleStorage } from './types.js';
import { createFilesystemStorage } from './fs.js';

export class BundleRunRepository implements RunRepository {
  constructor(private storage: BundleStorage) {}

  async create(input: CreateRunInput): Promise<ExperimentRun> {
    const id = input.id ?? crypto.randomUUID();
    if (await this.storage.exists(runRecordPath(id))) {
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
    await this.write(run);
    return run;
  }

  async get(id: Id): Promise<ExperimentRun | null> {
    if (!(await this.storage.exists(runRecordPath(id)))) {
      return null;
    }
    const content = await this.storage.readFile(runRecordPath(id));
    return JSON.parse(content) as ExperimentRun;
  }

  async list(filter?: RunFilter): Promise<ExperimentRun[]> {
    const ids = await this.storage.listDirectory(BUNDLE_DIRS.RUNS);
    const runs: ExperimentRun[] = [];
    for (const id of ids) {
      const run = await this.get(id);
      if (run && (!filter?.status || run.status === filter.status)) {
        runs.push(run);
      }
    }

    runs.sort((a, b) => b.startedAt.localeCompare(a.startedAt));
    const offset = filter?.offset ?? 0;
    return filter?.limit === undefined ? runs.slice(offset) : runs.slice(offset, offset + filter.limit);
  }

  async updateStatus(id: Id, input: UpdateRunStatusInput): Promise<ExperimentRun | null> {
    const run = await this.get(id);
    if (!run) return null;

    const updated: ExperimentRun = {
      ...run,
      status: input.status,
      reason: input.reason ?? run.reason,
      ticks: input.ticks ?? run.ticks,
      endedAt: input.endedAt ?? run.endedAt,
    };
    await this.write(updated);
    return updated;
  }

  private async write(run: ExperimentRun): Promise<void> {
    await this.storage.writeFile(runRecordPath(run.id), JSON.stringify(run, null, 2) + '\n');
  }
}

export class BundleSnapshotRepository implements SnapshotRepository {
  constructor(private storage: BundleStorage) {}

  async append(snapshot: StoredSnapshot): Promise<StoredSnapshot> {
    await this.storage.appendFile(snapshotsLogPath(snapshot.runId), stringifyNdjsonLine(snapshot));
    return snapshot;
  }

  async list(runId: Id, options?: SnapshotListOptions): Promise<StoredSnapshot[]> {
    const all = await this.readAll(runId);
    const offset = options?.offset ?? 0;
    return options?.limit === undefined ? all.slice(offset) : all.slice(offset, offset + options.limit);
  }

  async count(runId: Id): Promise<number> {
    return (await this.readAll(runId)).length;
  }

  async latest(runId: Id): Promise<StoredSnapshot | null> {
    const all = await this.readAll(runId);
    return all.length > 0 ? all[all.length - 1] : null;
  }

  async *stream(runId: Id): AsyncGenerator<StoredSnapshot> {
    for (const snapshot of await this.readAll(runId)) {
      yield snapshot;
    }
  }

  private async readAll(runId: Id): Promise<StoredSnapshot[]> {
    const logPath = snapshotsLogPath(runId);
    if (!(await this.storage.exists(logPath))) {
      return [];
    }
    return parseNdjson<StoredSnapshot>(await this.storage.readFile(logPath), logPath);
  }
}

/**
 * Create a RepositoryContext that stores runs under a bundle directory.
 *
 * Usage:
 * ```ts
 * const repos = createBundleRepositoryContext('./results');
 * ```
 */
export function createBundleRepositoryContext(
  root: string,
  storage: BundleStorage = createFilesystemStorage(root)
): RepositoryContext {
  return {
    runs: new BundleRunRepository(storage),
    snapshots: new BundleSnapshotRepository(storage),
  };
}
