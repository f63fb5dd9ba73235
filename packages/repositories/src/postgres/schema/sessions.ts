import { pgTable, text, bigint, jsonb, index } from 'drizzle-orm/pg-core';
import type { SessionDigest } from '@huddle/protocol';

/**
 * Session summaries - append-only, one row per closed session.
 *
 * Design notes:
 * - session_id is the primary key, so replaying a summary is a no-op
 * - Start/end are epoch milliseconds, matching the in-process clock
 */
export const sessionSummaries = pgTable(
  'session_summaries',
  {
    sessionId: text('session_id').primaryKey(),
    userId: text('user_id').notNull(),
    startedAt: bigint('started_at', { mode: 'number' }).notNull(),
    endedAt: bigint('ended_at', { mode: 'number' }).notNull(),
    digest: jsonb('digest').$type<SessionDigest>().notNull(),
    topics: jsonb('topics').$type<string[]>().notNull(),
  },
  (table) => [
    index('session_summaries_user_idx').on(table.userId),
    index('session_summaries_user_ended_idx').on(table.userId, table.endedAt),
  ]
);
