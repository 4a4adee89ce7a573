import { pgTable, text, timestamp, jsonb, integer, doublePrecision, primaryKey } from 'drizzle-orm/pg-core';
import type { SnapshotValues } from '@runcard/protocol';
import { experimentRuns } from './runs.js';

/**
 * Snapshots table - append-only variable values, one row per saved tick.
 *
 * Values are JSONB keyed by variable name; null marks a variable that had no
 * value yet.
 */
export const snapshots = pgTable(
  'snapshots',
  {
    runId: text('run_id')
      .notNull()
      .references(() => experimentRuns.id, { onDelete: 'cascade' }),
    tick: integer('tick').notNull(),
    time: doublePrecision('time').notNull(), // experiment seconds
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
    values: jsonb('values').$type<SnapshotValues>().notNull(),
  },
  (table) => [primaryKey({ columns: [table.runId, table.tick] })]
);
