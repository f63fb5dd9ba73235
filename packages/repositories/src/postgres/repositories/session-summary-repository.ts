import { eq, desc, asc } from 'drizzle-orm';
import type { Id, SessionSummary } from '@huddle/protocol';
import type { Database } from '../db.js';
import { sessionSummaries } from '../schema/index.js';
import type {
  SessionSummaryRepository,
  AppendResult,
  ListSessionSummariesOptions,
} from '../../interfaces/index.js';

type SessionSummaryRow = typeof sessionSummaries.$inferSelect;

export class PgSessionSummaryRepository implements SessionSummaryRepository {
  constructor(private db: Database) {}

  async append(summary: SessionSummary): Promise<AppendResult> {
    const inserted = await this.db
      .insert(sessionSummaries)
      .values(summaryToRow(summary))
      .onConflictDoNothing({ target: sessionSummaries.sessionId })
      .returning({ sessionId: sessionSummaries.sessionId });

    return { inserted: inserted.length > 0 };
  }

  async get(sessionId: Id): Promise<SessionSummary | null> {
    const [row] = await this.db
      .select()
      .from(sessionSummaries)
      .where(eq(sessionSummaries.sessionId, sessionId));

    return row ? rowToSessionSummary(row) : null;
  }

  async listForUser(userId: Id, options?: ListSessionSummariesOptions): Promise<SessionSummary[]> {
    const query = this.db
      .select()
      .from(sessionSummaries)
      .where(eq(sessionSummaries.userId, userId))
      .orderBy(desc(sessionSummaries.endedAt), asc(sessionSummaries.sessionId));

    const rows = options?.limit !== undefined ? await query.limit(options.limit) : await query;
    return rows.map(rowToSessionSummary);
  }
}

export function summaryToRow(summary: SessionSummary): SessionSummaryRow {
  return {
    sessionId: summary.sessionId,
    userId: summary.userId,
    startedAt: summary.startedAt,
    endedAt: summary.endedAt,
    digest: summary.digest,
    topics: summary.topics,
  };
}

export function rowToSessionSummary(row: SessionSummaryRow): SessionSummary {
  return {
    sessionId: row.sessionId,
    userId: row.userId,
    startedAt: row.startedAt,
    endedAt: row.endedAt,
    digest: row.digest,
    topics: row.topics,
  };
}
