import type { Id, SessionSummary } from '@huddle/protocol';

/**
 * Result of appending a record to an append-only store.
 * `inserted` is false when a record with the same key already existed.
 */
export type AppendResult = {
  inserted: boolean;
};

/**
 * Options for listing a user's session summaries
 */
export type ListSessionSummariesOptions = {
  /** Most recent first; defaults to all */
  limit?: number;
};

/**
 * Repository for closed-session summaries.
 *
 * Summaries are append-only and immutable. Appending a summary for a
 * session that already has one is a no-op, so writers may retry
 * (at-least-once delivery) without creating duplicates.
 */
export interface SessionSummaryRepository {
  /**
   * Persist a summary. Idempotent on sessionId.
   */
  append(summary: SessionSummary): Promise<AppendResult>;

  /**
   * Get a summary by session id
   */
  get(sessionId: Id): Promise<SessionSummary | null>;

  /**
   * List a user's summaries, most recently ended first
   */
  listForUser(userId: Id, options?: ListSessionSummariesOptions): Promise<SessionSummary[]>;
}
