// Shared fixtures for repository tests

import type { KnowledgeItem, SessionSummary } from '@huddle/protocol';

export function createMockSessionSummary(overrides: Partial<SessionSummary> = {}): SessionSummary {
  return {
    sessionId: 'session-1',
    userId: 'user-1',
    startedAt: 1_700_000_000_000,
    endedAt: 1_700_000_600_000,
    topics: ['predictions', 'modeling'],
    digest: {
      turnCount: 3,
      topics: ['predictions', 'modeling'],
      topicCounts: { predictions: 2, modeling: 1 },
      outcomes: { succeeded: 3, failed: 0 },
      totalTokens: 1200,
      roles: ['analyst', 'analyst', 'data_scientist'],
      keyInsights: ['The key driver is turnover margin'],
      averageResponseLength: 180,
    },
    ...overrides,
  };
}

export function createMockKnowledgeItem(overrides: Partial<KnowledgeItem> = {}): KnowledgeItem {
  return {
    id: 'knowledge-1',
    sourceAgentId: 'insight-1',
    knowledgeType: 'insight',
    topic: 'home field advantage',
    content: 'Home teams win 57% of conference games in the sample',
    confidence: 0.8,
    domainTags: ['analytics', 'predictions'],
    createdAt: '2024-09-01T12:00:00.000Z',
    ...overrides,
  };
}
