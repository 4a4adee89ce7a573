import { eq, desc } from 'drizzle-orm';
import type { Database } from '../db.js';
import { experimentRuns } from '../schema/index.js';
import type {
  RunRepository,
  CreateRunInput,
  UpdateRunStatusInput,
  RunFilter,
} from '../../interfaces/index.js';
import type { ExperimentRun, Id } from '@runcard/protocol';

export function rowToRun(row: typeof experimentRuns.$inferSelect): ExperimentRun {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    runcardPath: row.runcardPath ?? undefined,
    status: row.status,
    reason: row.reason ?? undefined,
    ticks: row.ticks,
    startedAt: row.startedAt.toISOString(),
    endedAt: row.endedAt?.toISOString(),
  };
}

export class PgRunRepository implements RunRepository {
  constructor(private db: Database) {}

  async create(input: CreateRunInput): Promise<ExperimentRun> {
    const [row] = await this.db
      .insert(experimentRuns)
      .values({
        id: input.id ?? crypto.randomUUID(),
        name: input.name,
        description: input.description ?? {},
        runcardPath: input.runcardPath,
        status: 'running',
        startedAt: input.startedAt ? new Date(input.startedAt) : new Date(),
      })
      .returning();

    return rowToRun(row);
  }

  async get(id: Id): Promise<ExperimentRun | null> {
    const [row] = await this.db.select().from(experimentRuns).where(eq(experimentRuns.id, id));

    return row ? rowToRun(row) : null;
  }

  async list(filter?: RunFilter): Promise<ExperimentRun[]> {
    let query = this.db.select().from(experimentRuns).$dynamic();

    if (filter?.status) {
      query = query.where(eq(experimentRuns.status, filter.status));
    }

    query = query.orderBy(desc(experimentRuns.startedAt));

    if (filter?.limit !== undefined) {
      query = query.limit(filter.limit);
    }

    if (filter?.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map(rowToRun);
  }

  async updateStatus(id: Id, input: UpdateRunStatusInput): Promise<ExperimentRun | null> {
    const changes: Partial<typeof experimentRuns.$inferInsert> = { status: input.status };
    if (input.reason !== undefined) changes.reason = input.reason;
    if (input.ticks !== undefined) changes.ticks = input.ticks;
    if (input.endedAt !== undefined) changes.endedAt = new Date(input.endedAt);

    const [row] = await this.db
      .update(experimentRuns)
      .set(changes)
      .where(eq(experimentRuns.id, id))
      .returning();

    return row ? rowToRun(row) : null;
  }
}
