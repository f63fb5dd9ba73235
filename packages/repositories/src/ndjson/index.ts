// NDJSON file repository implementations
//
// Each store is a single append-only .ndjson file under one directory:
//   <directory>/session-summaries.ndjson
//   <directory>/knowledge-items.ndjson

import * as path from 'node:path';
import {
  validateKnowledgeItem,
  validateSessionSummary,
  type KnowledgeItem,
  type SessionSummary,
  type SkippedNdjsonLine,
} from '@huddle/protocol';
import type {
  RepositoryContext,
  SessionSummaryRepository,
  KnowledgeRepository,
} from '../interfaces/index.js';
import { matchesKnowledgeFilter, sortSummariesByRecency, applyLimit } from '../filters.js';
import { NdjsonAppendLog } from './append-log.js';

export { NdjsonAppendLog, type AppendLogOptions } from './append-log.js';

export const SESSION_SUMMARIES_FILE = 'session-summaries.ndjson';
export const KNOWLEDGE_ITEMS_FILE = 'knowledge-items.ndjson';

export type NdjsonRepositoryOptions = {
  /** Directory holding the log files; created on first write */
  directory: string;

  /** Called when replay skips torn or invalid lines */
  onSkipped?: (filePath: string, skipped: SkippedNdjsonLine[]) => void;
};

export function createNdjsonSessionSummaryRepository(
  options: NdjsonRepositoryOptions
): SessionSummaryRepository {
  const log = new NdjsonAppendLog<SessionSummary>({
    filePath: path.join(options.directory, SESSION_SUMMARIES_FILE),
    validate: validateSessionSummary,
    keyOf: (summary) => summary.sessionId,
    onSkipped: options.onSkipped,
  });

  return {
    async append(summary) {
      return { inserted: await log.append(summary) };
    },
    async get(sessionId) {
      return log.get(sessionId);
    },
    async listForUser(userId, listOptions) {
      const owned = (await log.all()).filter((s) => s.userId === userId);
      return applyLimit(sortSummariesByRecency(owned), listOptions?.limit);
    },
  };
}

export function createNdjsonKnowledgeRepository(options: NdjsonRepositoryOptions): KnowledgeRepository {
  const log = new NdjsonAppendLog<KnowledgeItem>({
    filePath: path.join(options.directory, KNOWLEDGE_ITEMS_FILE),
    validate: validateKnowledgeItem,
    keyOf: (item) => item.id,
    onSkipped: options.onSkipped,
  });

  return {
    async append(item) {
      return { inserted: await log.append(item) };
    },
    async get(id) {
      return log.get(id);
    },
    async list(filter) {
      return (await log.all()).filter((item) => matchesKnowledgeFilter(item, filter));
    },
  };
}

/**
 * Create a RepositoryContext backed by NDJSON files.
 *
 * Usage:
 * ```ts
 * const repos = createNdjsonRepositoryContext({ directory: './data' });
 * ```
 */
export function createNdjsonRepositoryContext(options: NdjsonRepositoryOptions): RepositoryContext {
  return {
    sessionSummaries: createNdjsonSessionSummaryRepository(options),
    knowledge: createNdjsonKnowledgeRepository(options),
  };
}
