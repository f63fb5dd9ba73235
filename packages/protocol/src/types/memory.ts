// Conversation memory types

import type { Id } from './common.js';

/**
 * One completed request/response exchange. Never mutated after creation.
 */
export type ConversationTurn = {
  userId: Id;
  sessionId: Id;
  query: string;
  response: string;

  /** Resources actually handed to agents */
  contextSnapshot: {
    resourceIds: Id[];
    estimatedTokens: number;
  };

  tokensUsed: number;
  role: string;

  /** Epoch milliseconds */
  timestamp: number;

  topics: string[];
  success: boolean;
};

/**
 * Compressed view of all turns in a session, folded incrementally.
 */
export type SessionDigest = {
  turnCount: number;

  /** Topics in first-seen order */
  topics: string[];

  topicCounts: Record<string, number>;

  outcomes: {
    succeeded: number;
    failed: number;
  };

  totalTokens: number;

  /** Detected roles in turn order */
  roles: string[];

  /** At most five short excerpts from notable responses */
  keyInsights: string[];

  averageResponseLength: number;
};

/**
 * Immutable record of a closed session.
 */
export type SessionSummary = {
  sessionId: Id;
  userId: Id;

  /** Epoch milliseconds */
  startedAt: number;
  endedAt: number;

  digest: SessionDigest;
  topics: string[];
};

export type ExpertiseLevel = 'beginner' | 'intermediate' | 'advanced';

/**
 * Raw turn trimmed down for handing to agents
 */
export type RecentTurnView = {
  query: string;
  /** Clipped to 200 characters */
  response: string;
  role: string;
  topics: string[];
  timestamp: number;
};

/**
 * What conversation memory adds to a request's context. Derived from
 * memory without modifying it.
 */
export type MemoryEnhancement = {
  userId: string;
  activeSessionId?: string;
  recentTurns: RecentTurnView[];
  relevantSummary?: SessionSummary;
  preferences: {
    expertiseLevel: ExpertiseLevel;
    /** Most frequent first, at most five */
    preferredTopics: string[];
  };
  continuity: {
    lastTopic?: string;
    lastRole?: string;
    /** Turns in the active session */
    momentum: number;
  };
  /** False when the memory store could not be read */
  memoryAvailable: boolean;
};
