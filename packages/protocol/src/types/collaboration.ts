// Collaboration types: shared knowledge and peer review

import type { Id, Timestamp } from './common.js';

/**
 * A published piece of knowledge. Immutable; later items on the same
 * topic supersede earlier ones.
 */
export type KnowledgeItem = {
  id: Id;
  sourceAgentId: Id;

  /** Type tag, e.g. "insight", "pattern", "warning" */
  knowledgeType: string;

  /** Items on the same topic supersede each other */
  topic: string;

  content: string;

  /** In [0, 1] */
  confidence: number;

  domainTags: string[];
  createdAt: Timestamp;

  /** Id of the item this one replaces */
  supersedes?: Id;
};

export type ReviewVerdict = 'approve' | 'revise' | 'reject';

/**
 * Status of a peer review task:
 * pending -> in_review -> resolved | conflicted
 */
export type CollaborationTaskStatus = 'pending' | 'in_review' | 'resolved' | 'conflicted';

/**
 * A reviewer's answer, or the lack of one
 */
export type ReviewRecord = {
  reviewerAgentId: Id;
  verdict: ReviewVerdict | 'no_response';
  comments?: string;
  durationMs: number;
};

export type CollaborationResolution = {
  decision: 'approved' | 'conflicted';
  approvals: number;
  rejections: number;
  revisions: number;
  summary: string;
};

/**
 * One peer-review request
 */
export type CollaborationTask = {
  taskId: Id;
  initiatorAgentId: Id;
  payload: unknown;
  reviewerAgentIds: Id[];
  status: CollaborationTaskStatus;
  reviews: ReviewRecord[];
  resolution?: CollaborationResolution;
  createdAt: Timestamp;
  updatedAt: Timestamp;
};
