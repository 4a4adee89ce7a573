import type { ExperimentRun, Id, RunStatus, RuncardDescription, Timestamp } from '@runcard/protocol';

/**
 * Input for recording the start of a run
 */
export type CreateRunInput = {
  id?: Id;
  name: string;
  description?: RuncardDescription;
  runcardPath?: string;
  startedAt?: Timestamp; // ISO 8601, defaults to now
};

/**
 * Input for recording how a run ended (or is progressing)
 */
export type UpdateRunStatusInput = {
  status: RunStatus;
  reason?: string;
  ticks?: number;
  endedAt?: Timestamp;
};

export type RunFilter = {
  status?: RunStatus;
  limit?: number;
  offset?: number;
};

/**
 * Repository interface for experiment run records.
 *
 * A run record is created before the first tick and updated once the
 * scheduler terminates.
 */
export interface RunRepository {
  create(input: CreateRunInput): Promise<ExperimentRun>;

  /**
   * @returns ExperimentRun or null if not found
   */
  get(id: Id): Promise<ExperimentRun | null>;

  /**
   * List runs, most recently started first
   */
  list(filter?: RunFilter): Promise<ExperimentRun[]>;

  /**
   * @returns The updated run, or null if not found
   */
  updateStatus(id: Id, input: UpdateRunStatusInput): Promise<ExperimentRun | null>;
}
