import type { Database } from '../db.js';
import type { RepositoryContext } from '../../interfaces/index.js';
import { PgSessionSummaryRepository } from './session-summary-repository.js';
import { PgKnowledgeRepository } from './knowledge-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return {
    sessionSummaries: new PgSessionSummaryRepository(db),
    knowledge: new PgKnowledgeRepository(db),
  };
}
