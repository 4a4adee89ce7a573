// Run bundle path constants
// Defines the folder/file structure used to store experiment runs on disk

/**
 * Root-level directories in a run bundle
 */
export const BUNDLE_DIRS = {
  RUNS: 'runs',
} as const;

/**
 * Files within a run directory
 */
export const RUN_FILES = {
  RUN_JSON: 'run.json',
  SNAPSHOTS_NDJSON: 'snapshots.ndjson',
} as const;

/**
 * Build a path to a run directory
 */
export function runPath(runId: string): string {
  return `${BUNDLE_DIRS.RUNS}/${runId}`;
}

/**
 * Build a path to a run's record file
 */
export function runRecordPath(runId: string): string {
  return `${runPath(runId)}/${RUN_FILES.RUN_JSON}`;
}

/**
 * Build a path to a run's append-only snapshot log
 */
export function snapshotsLogPath(runId: string): string {
  return `${runPath(runId)}/${RUN_FILES.SNAPSHOTS_NDJSON}`;
}
