// Experiment run records

import type { Id, Timestamp } from './common.js';
import type { RuncardDescription } from './runcard.js';

export type RunStatus = 'running' | 'completed' | 'stopped' | 'aborted' | 'failed';

/**
 * Persisted record of one execution of a runcard.
 */
export type ExperimentRun = {
  id: Id;
  name: string;
  description: RuncardDescription;

  /**
   * File the runcard was loaded from, if any
   */
  runcardPath?: string;

  status: RunStatus;

  /**
   * Why the run ended (alarm name, error message, ...)
   */
  reason?: string;

  ticks: number;
  startedAt: Timestamp;
  endedAt?: Timestamp;
};
