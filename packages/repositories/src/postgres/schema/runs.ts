import { pgTable, text, timestamp, jsonb, integer, index } from 'drizzle-orm/pg-core';
import type { RuncardDescription } from '@runcard/protocol';

/**
 * Experiment runs table - one row per execution of a runcard.
 */
export const experimentRuns = pgTable(
  'experiment_runs',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    description: jsonb('description').$type<RuncardDescription>().notNull().default({}),
    runcardPath: text('runcard_path'),
    status: text('status', {
      enum: ['running', 'completed', 'stopped', 'aborted', 'failed'],
    }).notNull(),
    reason: text('reason'), // alarm name or error message for aborted/failed runs
    ticks: integer('ticks').notNull().default(0),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull().defaultNow(),
    endedAt: timestamp('ended_at', { withTimezone: true }),
  },
  (table) => [
    index('experiment_runs_status_idx').on(table.status),
    index('experiment_runs_started_idx').on(table.startedAt),
  ]
);
