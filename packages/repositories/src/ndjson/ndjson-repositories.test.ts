// Tests for the NDJSON file repositories

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  createNdjsonRepositoryContext,
  createNdjsonSessionSummaryRepository,
  SESSION_SUMMARIES_FILE,
  KNOWLEDGE_ITEMS_FILE,
} from './index.js';
import { createMockKnowledgeItem, createMockSessionSummary } from '../testing/fixtures.js';

describe('NDJSON repositories', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'huddle-ndjson-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('should round-trip a session summary through a fresh reader', async () => {
    const summary = createMockSessionSummary();
    const writer = createNdjsonRepositoryContext({ directory });
    await writer.sessionSummaries.append(summary);

    const reader = createNdjsonRepositoryContext({ directory });
    const reloaded = await reader.sessionSummaries.get(summary.sessionId);

    expect(reloaded).toEqual(summary);
    expect(reloaded?.digest.topics).toEqual(summary.digest.topics);
    expect(reloaded?.digest.turnCount).toBe(3);
  });

  it('should write a duplicate summary only once', async () => {
    const repos = createNdjsonRepositoryContext({ directory });
    const results = await Promise.all([
      repos.sessionSummaries.append(createMockSessionSummary()),
      repos.sessionSummaries.append(createMockSessionSummary()),
    ]);

    expect(results.map((r) => r.inserted)).toEqual([true, false]);

    const content = await fs.readFile(path.join(directory, SESSION_SUMMARIES_FILE), 'utf-8');
    expect(content.trim().split('\n')).toHaveLength(1);
  });

  it('should collapse duplicate lines written by a retried append', async () => {
    const line = JSON.stringify(createMockSessionSummary()) + '\n';
    await fs.writeFile(path.join(directory, SESSION_SUMMARIES_FILE), line + line, 'utf-8');

    const repo = createNdjsonSessionSummaryRepository({ directory });
    expect(await repo.listForUser('user-1')).toHaveLength(1);
  });

  it('should skip a torn final line and report it', async () => {
    const good = JSON.stringify(createMockKnowledgeItem()) + '\n';
    await fs.writeFile(path.join(directory, KNOWLEDGE_ITEMS_FILE), good + '{"id":"knowl', 'utf-8');

    const onSkipped = vi.fn();
    const repos = createNdjsonRepositoryContext({ directory, onSkipped });
    const items = await repos.knowledge.list();

    expect(items.map((k) => k.id)).toEqual(['knowledge-1']);
    expect(onSkipped).toHaveBeenCalledTimes(1);
    expect(onSkipped.mock.calls[0][1]).toHaveLength(1);
    expect(onSkipped.mock.calls[0][1][0].line).toBe(2);
  });

  it('should return nothing before the first write', async () => {
    const repos = createNdjsonRepositoryContext({ directory: path.join(directory, 'missing') });
    expect(await repos.sessionSummaries.get('session-1')).toBeNull();
    expect(await repos.knowledge.list()).toEqual([]);
  });
});
