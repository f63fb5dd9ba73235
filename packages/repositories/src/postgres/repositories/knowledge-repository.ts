import { eq, and, asc, sql, type SQL } from 'drizzle-orm';
import type { Id, KnowledgeItem } from '@huddle/protocol';
import type { Database } from '../db.js';
import { knowledgeItems } from '../schema/index.js';
import type { KnowledgeRepository, KnowledgeFilter, AppendResult } from '../../interfaces/index.js';

type KnowledgeItemRow = typeof knowledgeItems.$inferSelect;

export class PgKnowledgeRepository implements KnowledgeRepository {
  constructor(private db: Database) {}

  async append(item: KnowledgeItem): Promise<AppendResult> {
    const inserted = await this.db
      .insert(knowledgeItems)
      .values(knowledgeItemToRow(item))
      .onConflictDoNothing({ target: knowledgeItems.id })
      .returning({ id: knowledgeItems.id });

    return { inserted: inserted.length > 0 };
  }

  async get(id: Id): Promise<KnowledgeItem | null> {
    const [row] = await this.db.select().from(knowledgeItems).where(eq(knowledgeItems.id, id));
    return row ? rowToKnowledgeItem(row) : null;
  }

  async list(filter?: KnowledgeFilter): Promise<KnowledgeItem[]> {
    const conditions: SQL[] = [];

    if (filter?.knowledgeType) {
      conditions.push(eq(knowledgeItems.knowledgeType, filter.knowledgeType));
    }

    if (filter?.topic) {
      conditions.push(eq(knowledgeItems.topic, filter.topic));
    }

    if (filter?.sourceAgentId) {
      conditions.push(eq(knowledgeItems.sourceAgentId, filter.sourceAgentId));
    }

    if (filter?.tags && filter.tags.length > 0) {
      const tags = sql.join(
        filter.tags.map((tag) => sql`${tag}`),
        sql`, `
      );
      conditions.push(sql`${knowledgeItems.domainTags} ?| array[${tags}]::text[]`);
    }

    const rows = await this.db
      .select()
      .from(knowledgeItems)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(knowledgeItems.createdAt), asc(knowledgeItems.id));

    return rows.map(rowToKnowledgeItem);
  }
}

export function knowledgeItemToRow(item: KnowledgeItem): KnowledgeItemRow {
  return {
    id: item.id,
    sourceAgentId: item.sourceAgentId,
    knowledgeType: item.knowledgeType,
    topic: item.topic,
    content: item.content,
    confidence: item.confidence,
    domainTags: item.domainTags,
    createdAt: new Date(item.createdAt),
    supersedes: item.supersedes ?? null,
  };
}

export function rowToKnowledgeItem(row: KnowledgeItemRow): KnowledgeItem {
  const item: KnowledgeItem = {
    id: row.id,
    sourceAgentId: row.sourceAgentId,
    knowledgeType: row.knowledgeType,
    topic: row.topic,
    content: row.content,
    confidence: row.confidence,
    domainTags: row.domainTags,
    createdAt: row.createdAt.toISOString(),
  };
  if (row.supersedes) {
    item.supersedes = row.supersedes;
  }
  return item;
}
