// Schemas for persisted records (session summaries, knowledge items)
//
// Used when replaying append-only logs, where a line may have been
// written by an older process or truncated mid-write.

import { z } from 'zod';
import type { KnowledgeItem } from '../types/collaboration.js';
import type { SessionDigest, SessionSummary } from '../types/memory.js';
import { validateWith, type ValidationResult } from './common.js';

export const sessionDigestSchema: z.ZodType<SessionDigest, z.ZodTypeDef, unknown> = z.object({
  turnCount: z.number().int().nonnegative(),
  topics: z.array(z.string()),
  topicCounts: z.record(z.number().int().nonnegative()),
  outcomes: z.object({
    succeeded: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
  }),
  totalTokens: z.number().nonnegative(),
  roles: z.array(z.string()),
  keyInsights: z.array(z.string()).max(5),
  averageResponseLength: z.number().nonnegative(),
});

export const sessionSummarySchema: z.ZodType<SessionSummary, z.ZodTypeDef, unknown> = z.object({
  sessionId: z.string().min(1),
  userId: z.string().min(1),
  startedAt: z.number(),
  endedAt: z.number(),
  digest: sessionDigestSchema,
  topics: z.array(z.string()),
});

export const knowledgeItemSchema: z.ZodType<KnowledgeItem, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  sourceAgentId: z.string().min(1),
  knowledgeType: z.string().min(1),
  topic: z.string().min(1),
  content: z.string(),
  confidence: z.number().min(0).max(1),
  domainTags: z.array(z.string()),
  createdAt: z.string(),
  supersedes: z.string().optional(),
});

/**
 * Input accepted when publishing knowledge; id, timestamps and
 * supersession are assigned by the store.
 */
export type PublishKnowledgeInput = Pick<
  KnowledgeItem,
  'sourceAgentId' | 'knowledgeType' | 'topic' | 'content' | 'confidence' | 'domainTags'
>;

export const publishKnowledgeInputSchema: z.ZodType<PublishKnowledgeInput, z.ZodTypeDef, unknown> =
  z.object({
    sourceAgentId: z.string().min(1),
    knowledgeType: z.string().min(1),
    topic: z.string().trim().min(1),
    content: z.string().min(1),
    confidence: z.number().min(0, 'confidence must be in [0, 1]').max(1, 'confidence must be in [0, 1]'),
    domainTags: z.array(z.string().min(1)).min(1, 'at least one domain tag is required'),
  });

export function validateSessionSummary(input: unknown): ValidationResult<SessionSummary> {
  return validateWith(sessionSummarySchema, input);
}

export function validateKnowledgeItem(input: unknown): ValidationResult<KnowledgeItem> {
  return validateWith(knowledgeItemSchema, input);
}

export function validatePublishKnowledgeInput(input: unknown): ValidationResult<PublishKnowledgeInput> {
  return validateWith(publishKnowledgeInputSchema, input);
}
