// Sink channel - one sink behind its own queue and drain loop

import type { Snapshot, Timestamp } from '@runcard/protocol';
import type { EngineLogger } from '../logging.js';
import { silentLogger } from '../logging.js';
import { SnapshotQueue } from './queue.js';
import type { SinkStats, SnapshotSink } from './types.js';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Connects the tick loop to one sink.
 *
 * `offer` only enqueues; delivery starts on a later microtask and never blocks
 * the caller. A failing write is logged and counted, and delivery continues
 * with the next snapshot.
 */
export class SinkChannel {
  readonly sink: SnapshotSink;
  private readonly queue: SnapshotQueue<Snapshot>;
  private readonly logger: EngineLogger;
  private pending: Promise<void> | null = null;
  private delivered = 0;
  private failed = 0;
  private lastDeliveredAt: Timestamp | null = null;
  private closed = false;

  constructor(sink: SnapshotSink, capacity: number, logger: EngineLogger = silentLogger) {
    this.sink = sink;
    this.queue = new SnapshotQueue(capacity);
    this.logger = logger;
  }

  get channel(): SnapshotSink['channel'] {
    return this.sink.channel;
  }

  async open(): Promise<void> {
    await this.sink.open?.();
  }

  /**
   * Hand a snapshot to the sink without waiting for it.
   */
  offer(snapshot: Snapshot): void {
    if (this.closed) {
      throw new Error(`Sink "${this.sink.name}" is closed`);
    }

    const dropped = this.queue.push(snapshot);
    if (dropped) {
      this.logger.warn('Snapshot dropped: sink queue full', {
        sink: this.sink.name,
        tick: dropped.tick,
        dropped: this.queue.dropped,
      });
    }

    if (!this.pending) {
      this.pending = Promise.resolve().then(() => this.drain());
    }
  }

  /**
   * Wait until every queued snapshot has been handed to the sink.
   */
  async flush(): Promise<void> {
    while (this.pending) {
      await this.pending;
    }
  }

  /**
   * Flush, then close the sink. Close failures are logged and counted.
   */
  async close(): Promise<void> {
    await this.flush();
    this.closed = true;
    try {
      await this.sink.close?.();
    } catch (error) {
      this.failed++;
      this.logger.error('Sink failed to close', { sink: this.sink.name, error: describe(error) });
    }
  }

  stats(): SinkStats {
    return {
      delivered: this.delivered,
      dropped: this.queue.dropped,
      failed: this.failed,
      queued: this.queue.size,
      lastDeliveredAt: this.lastDeliveredAt,
    };
  }

  private async drain(): Promise<void> {
    let snapshot = this.queue.shift();
    while (snapshot) {
      try {
        await this.sink.write(snapshot);
        this.delivered++;
        this.lastDeliveredAt = snapshot.timestamp;
      } catch (error) {
        this.failed++;
        this.logger.error('Sink failed to write snapshot', {
          sink: this.sink.name,
          tick: snapshot.tick,
          error: describe(error),
        });
      }
      snapshot = this.queue.shift();
    }
    this.pending = null;
  }
}
