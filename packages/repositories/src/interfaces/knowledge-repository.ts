import type { Id, KnowledgeItem } from '@huddle/protocol';
import type { AppendResult } from './session-summary-repository.js';

/**
 * Filter for listing knowledge items. All fields are ANDed.
 */
export type KnowledgeFilter = {
  /** Match items carrying any of these tags */
  tags?: string[];
  knowledgeType?: string;
  topic?: string;
  sourceAgentId?: Id;
};

/**
 * Append-only store of published knowledge items.
 * Items are never updated; supersession is recorded on the newer item.
 */
export interface KnowledgeRepository {
  /**
   * Persist an item. Idempotent on id.
   */
  append(item: KnowledgeItem): Promise<AppendResult>;

  get(id: Id): Promise<KnowledgeItem | null>;

  /**
   * List items in publication order (oldest first)
   */
  list(filter?: KnowledgeFilter): Promise<KnowledgeItem[]>;
}
