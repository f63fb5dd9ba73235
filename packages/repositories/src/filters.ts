// Filtering and ordering shared by the non-SQL implementations

import type { KnowledgeItem, SessionSummary } from '@huddle/protocol';
import type { KnowledgeFilter } from './interfaces/index.js';

export function matchesKnowledgeFilter(item: KnowledgeItem, filter?: KnowledgeFilter): boolean {
  if (!filter) return true;
  if (filter.knowledgeType && item.knowledgeType !== filter.knowledgeType) return false;
  if (filter.topic && item.topic !== filter.topic) return false;
  if (filter.sourceAgentId && item.sourceAgentId !== filter.sourceAgentId) return false;
  if (filter.tags && filter.tags.length > 0) {
    return filter.tags.some((tag) => item.domainTags.includes(tag));
  }
  return true;
}

/**
 * Most recently ended first, then by session id for a stable order
 */
export function sortSummariesByRecency(summaries: SessionSummary[]): SessionSummary[] {
  return [...summaries].sort(
    (a, b) => b.endedAt - a.endedAt || a.sessionId.localeCompare(b.sessionId)
  );
}

export function applyLimit<T>(items: T[], limit?: number): T[] {
  return limit !== undefined ? items.slice(0, limit) : items;
}
