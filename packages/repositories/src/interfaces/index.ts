// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  RunRepository,
  CreateRunInput,
  UpdateRunStatusInput,
  RunFilter,
} from './run-repository.js';

export type { SnapshotRepository, SnapshotListOptions } from './snapshot-repository.js';

export type { RepositoryContext, RepositoryContextFactory } from './repository-context.js';
