// In-memory repository implementations for development and testing
//
// Data does not persist between restarts.

import type { Id, KnowledgeItem, SessionSummary } from '@huddle/protocol';
import type {
  RepositoryContext,
  SessionSummaryRepository,
  KnowledgeRepository,
} from '../interfaces/index.js';
import { matchesKnowledgeFilter, sortSummariesByRecency, applyLimit } from '../filters.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  sessionSummaries: Map<Id, SessionSummary>;
  /** Publication order is preserved by insertion order */
  knowledge: Map<Id, KnowledgeItem>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends RepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

/**
 * Create a complete in-memory repository context.
 *
 * Stored records are deep-copied on the way in and out, so callers
 * cannot mutate what the store holds.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * await repos.sessionSummaries.append(summary);
 * console.log(repos._data.sessionSummaries.size);
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const sessionSummaries = new Map<Id, SessionSummary>();
  const knowledge = new Map<Id, KnowledgeItem>();

  const summaryRepo: SessionSummaryRepository = {
    async append(summary) {
      if (sessionSummaries.has(summary.sessionId)) {
        return { inserted: false };
      }
      sessionSummaries.set(summary.sessionId, structuredClone(summary));
      return { inserted: true };
    },
    async get(sessionId) {
      const summary = sessionSummaries.get(sessionId);
      return summary ? structuredClone(summary) : null;
    },
    async listForUser(userId, options) {
      const owned = Array.from(sessionSummaries.values()).filter((s) => s.userId === userId);
      return applyLimit(sortSummariesByRecency(owned), options?.limit).map((s) => structuredClone(s));
    },
  };

  const knowledgeRepo: KnowledgeRepository = {
    async append(item) {
      if (knowledge.has(item.id)) {
        return { inserted: false };
      }
      knowledge.set(item.id, structuredClone(item));
      return { inserted: true };
    },
    async get(id) {
      const item = knowledge.get(id);
      return item ? structuredClone(item) : null;
    },
    async list(filter) {
      return Array.from(knowledge.values())
        .filter((item) => matchesKnowledgeFilter(item, filter))
        .map((item) => structuredClone(item));
    },
  };

  return {
    sessionSummaries: summaryRepo,
    knowledge: knowledgeRepo,
    _data: { sessionSummaries, knowledge },
    clear() {
      sessionSummaries.clear();
      knowledge.clear();
    },
  };
}
