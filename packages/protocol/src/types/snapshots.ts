// Snapshots - the unit handed to plotting and saving

import type { Id, Timestamp } from './common.js';

/**
 * Variable name -> value. Null means the variable had no value yet.
 */
export type SnapshotValues = Readonly<Record<string, number | null>>;

/**
 * An immutable, timestamped set of all variable values at the end of a tick.
 */
export type Snapshot = {
  readonly tick: number;

  /**
   * Experiment time in seconds (the gated clock)
   */
  readonly time: number;

  /**
   * Wall-clock time the snapshot was taken
   */
  readonly timestamp: Timestamp;

  readonly values: SnapshotValues;
};

/**
 * A snapshot as stored by a repository
 */
export type StoredSnapshot = Snapshot & {
  runId: Id;
};
