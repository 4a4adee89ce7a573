import type { Id, StoredSnapshot } from '@runcard/protocol';

export type SnapshotListOptions = {
  limit?: number;
  offset?: number;
};

/**
 * Repository interface for saved snapshots.
 *
 * Snapshots are immutable, append-only and ordered by tick within a run.
 */
export interface SnapshotRepository {
  append(snapshot: StoredSnapshot): Promise<StoredSnapshot>;

  /**
   * Snapshots of a run in tick order
   */
  list(runId: Id, options?: SnapshotListOptions): Promise<StoredSnapshot[]>;

  count(runId: Id): Promise<number>;

  /**
   * @returns The snapshot with the highest tick, or null if the run has none
   */
  latest(runId: Id): Promise<StoredSnapshot | null>;

  /**
   * Stream a run's snapshots in tick order (for export)
   */
  stream(runId: Id): AsyncIterable<StoredSnapshot>;
}
