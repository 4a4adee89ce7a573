import { eq, asc, desc, sql } from 'drizzle-orm';
import type { Database } from '../db.js';
import { snapshots } from '../schema/index.js';
import type { SnapshotRepository, SnapshotListOptions } from '../../interfaces/index.js';
import type { Id, StoredSnapshot } from '@runcard/protocol';

export function rowToSnapshot(row: typeof snapshots.$inferSelect): StoredSnapshot {
  return {
    runId: row.runId,
    tick: row.tick,
    time: row.time,
    timestamp: row.timestamp.toISOString(),
    values: row.values,
  };
}

export class PgSnapshotRepository implements SnapshotRepository {
  constructor(private db: Database) {}

  async append(snapshot: StoredSnapshot): Promise<StoredSnapshot> {
    const [row] = await this.db
      .insert(snapshots)
      .values({
        runId: snapshot.runId,
        tick: snapshot.tick,
        time: snapshot.time,
        timestamp: new Date(snapshot.timestamp),
        values: snapshot.values,
      })
      .returning();

    return rowToSnapshot(row);
  }

  async list(runId: Id, options?: SnapshotListOptions): Promise<StoredSnapshot[]> {
    let query = this.db
      .select()
      .from(snapshots)
      .where(eq(snapshots.runId, runId))
      .orderBy(asc(snapshots.tick))
      .$dynamic();

    if (options?.limit !== undefined) {
      query = query.limit(options.limit);
    }

    if (options?.offset) {
      query = query.offset(options.offset);
    }

    const rows = await query;
    return rows.map(rowToSnapshot);
  }

  async count(runId: Id): Promise<number> {
    const [result] = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(snapshots)
      .where(eq(snapshots.runId, runId));

    return Number(result?.count ?? 0);
  }

  async latest(runId: Id): Promise<StoredSnapshot | null> {
    const [row] = await this.db
      .select()
      .from(snapshots)
      .where(eq(snapshots.runId, runId))
      .orderBy(desc(snapshots.tick))
      .limit(1);

    return row ? rowToSnapshot(row) : null;
  }

  async *stream(runId: Id): AsyncGenerator<StoredSnapshot> {
    // Page through the run so long experiments are never loaded at once
    const batchSize = 1000;
    let offset = 0;

    while (true) {
      const batch = await this.list(runId, { limit: batchSize, offset });

      for (const snapshot of batch) {
        yield snapshot;
      }

      if (batch.length < batchSize) break;
      offset += batchSize;
    }
  }
}
