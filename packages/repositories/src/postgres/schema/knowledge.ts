import { pgTable, text, doublePrecision, jsonb, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Knowledge items - immutable append-only log of published knowledge.
 * A newer item on the same topic names the one it replaces in `supersedes`.
 */
export const knowledgeItems = pgTable(
  'knowledge_items',
  {
    id: text('id').primaryKey(),
    sourceAgentId: text('source_agent_id').notNull(),
    knowledgeType: text('knowledge_type').notNull(),
    topic: text('topic').notNull(),
    content: text('content').notNull(),
    confidence: doublePrecision('confidence').notNull(),
    domainTags: jsonb('domain_tags').$type<string[]>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
    supersedes: text('supersedes'),
  },
  (table) => [
    index('knowledge_items_topic_idx').on(table.topic),
    index('knowledge_items_type_idx').on(table.knowledgeType),
    index('knowledge_items_created_idx').on(table.createdAt),
  ]
);
