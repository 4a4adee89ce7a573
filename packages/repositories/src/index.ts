// @runcard/repositories
// Repository interfaces and implementations for experiment runs and snapshots.
//
// The runtime's save sinks and the CLI code against these interfaces; the
// implementations (Postgres, bundle directory, in-memory) are interchangeable.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection

export * from './interfaces/index.js';
export {
  createInMemoryRepositoryContext,
  type InMemoryRepositoryContext,
  type InMemoryDataStore,
} from './in-memory/index.js';
export * as postgres from './postgres/index.js';
export * as bundle from './bundle/index.js';
