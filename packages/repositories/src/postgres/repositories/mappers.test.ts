// Tests for Postgres row mapping (no database required)

import { describe, it, expect } from 'vitest';
import { summaryToRow, rowToSessionSummary } from './session-summary-repository.js';
import { knowledgeItemToRow, rowToKnowledgeItem } from './knowledge-repository.js';
import { createMockKnowledgeItem, createMockSessionSummary } from '../../testing/fixtures.js';

describe('session summary rows', () => {
  it('should map a summary to a row and back', () => {
    const summary = createMockSessionSummary();
    expect(rowToSessionSummary(summaryToRow(summary))).toEqual(summary);
  });
});

describe('knowledge item rows', () => {
  it('should store created time as a Date and null supersedes', () => {
    const row = knowledgeItemToRow(createMockKnowledgeItem());

    expect(row.createdAt).toEqual(new Date('2024-09-01T12:00:00.000Z'));
    expect(row.supersedes).toBeNull();
  });

  it('should omit supersedes when the column is null', () => {
    const item = rowToKnowledgeItem(knowledgeItemToRow(createMockKnowledgeItem()));
    expect('supersedes' in item).toBe(false);
    expect(item.createdAt).toBe('2024-09-01T12:00:00.000Z');
  });

  it('should keep supersedes when present', () => {
    const item = createMockKnowledgeItem({ id: 'knowledge-2', supersedes: 'knowledge-1' });
    expect(rowToKnowledgeItem(knowledgeItemToRow(item))).toEqual(item);
  });
});
