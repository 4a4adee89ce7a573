// Snapshot sink types

import type { Snapshot, Timestamp } from '@runcard/protocol';

/**
 * Which cadence a sink follows: plot sinks get a snapshot every plot interval,
 * save sinks every save interval.
 */
export type SinkChannelKind = 'plot' | 'save';

/**
 * A consumer of snapshots (plot surface, results file, database, ...).
 *
 * Sinks run off the tick loop: the scheduler hands snapshots to a bounded
 * queue and never waits for a write.
 */
export interface SnapshotSink {
  readonly name: string;
  readonly channel: SinkChannelKind;
  open?(): Promise<void>;
  write(snapshot: Snapshot): Promise<void>;
  close?(): Promise<void>;
}

export type SinkStats = {
  delivered: number;
  dropped: number;
  failed: number;
  queued: number;

  /**
   * Timestamp of the last snapshot the sink accepted
   */
  lastDeliveredAt: Timestamp | null;
};
