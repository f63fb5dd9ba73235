import type { SessionSummaryRepository } from './session-summary-repository.js';
import type { KnowledgeRepository } from './knowledge-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the dependency injection point for the runtime: conversation
 * memory persists summaries through it and the collaboration manager
 * persists knowledge through it. Swap implementations (Postgres, NDJSON
 * files, in-memory) without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createPgRepositoryContext(db);
 * const memory = new ConversationMemory({ summaries: repos.sessionSummaries });
 * ```
 */
export interface RepositoryContext {
  readonly sessionSummaries: SessionSummaryRepository;
  readonly knowledge: KnowledgeRepository;
}

/**
 * Factory type for creating a RepositoryContext.
 */
export type RepositoryContextFactory<TConfig = unknown> = (
  config: TConfig
) => RepositoryContext | Promise<RepositoryContext>;
