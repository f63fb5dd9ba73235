// @huddle/repositories
// Persistence contracts and implementations for the append-only records
// the orchestration core keeps: closed-session summaries and published
// knowledge items.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - Every store is append-only and idempotent on its record key

export * from './interfaces/index.js';
export {
  createInMemoryRepositoryContext,
  type InMemoryRepositoryContext,
  type InMemoryDataStore,
} from './in-memory/index.js';
export * as ndjson from './ndjson/index.js';
export * as postgres from './postgres/index.js';
