// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  SessionSummaryRepository,
  AppendResult,
  ListSessionSummariesOptions,
} from './session-summary-repository.js';

export type { KnowledgeRepository, KnowledgeFilter } from './knowledge-repository.js';

export type { RepositoryContext, RepositoryContextFactory } from './repository-context.js';
