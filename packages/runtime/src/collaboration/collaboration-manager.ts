// Collaboration manager - shared knowledge, expert lookup and peer review

import {
  validatePublishKnowledgeInput,
  type CollaborationResolution,
  type CollaborationTask,
  type Id,
  type KnowledgeItem,
  type ReviewRecord,
} from '@huddle/protocol';
import type { KnowledgeRepository } from '@huddle/repositories';
import type { AgentRuntime } from '../agents/types.js';
import type { CapabilityRegistry } from '../registry/capability-registry.js';
import { compareIds } from '../registry/capability-registry.js';
import { LoadTracker } from '../router/load-tracker.js';
import type { Logger } from '../logger.js';
import { consoleLogger, withLogContext } from '../logger.js';
import { AgentTimeoutError, ValidationError, errorMessage } from '../errors.js';
import { DEFAULT_REVIEWERS_PER_TASK, DEFAULT_REVIEW_TIMEOUT_MS } from '../config.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import { withTimeout } from '../concurrency/timeout.js';
import { isTerminal, transitionTask } from './review-task.js';

export const DEFAULT_MIN_CONFIDENCE = 0.5;

/** Finished review tasks kept for lookup before the oldest are dropped */
export const DEFAULT_MAX_RETAINED_TASKS = 500;

export type KnowledgeQuery = {
  /** Match items carrying any of these tags */
  tags?: string[];
  knowledgeType?: string;
  topic?: string;

  /** Default: 0.5 */
  minConfidence?: number;

  /** Default: false */
  includeSuperseded?: boolean;

  limit?: number;
};

export type PeerReviewOptions = {
  /** Reviewers to ask (default: configured reviewers per task) */
  reviewers?: number;

  /** Per-reviewer deadline */
  timeoutMs?: number;
};

export type CollaborationManagerOptions = {
  registry: CapabilityRegistry;
  knowledge: KnowledgeRepository;

  /** Shared with the router so reviews count toward agent load */
  loads?: LoadTracker;

  reviewersPerTask?: number;
  reviewTimeoutMs?: number;

  /** Default: 500. Pending and in-review tasks are never dropped. */
  maxRetainedTasks?: number;

  now?: () => number;
  generateId?: () => string;

  /**
   * Logger for structured logging (defaults to console)
   */
  logger?: Logger;
};

export class CollaborationManager {
  private readonly registry: CapabilityRegistry;
  private readonly knowledge: KnowledgeRepository;
  private readonly loads: LoadTracker;
  private readonly reviewersPerTask: number;
  private readonly reviewTimeoutMs: number;
  private readonly maxRetainedTasks: number;
  private readonly now: () => number;
  private readonly generateId: () => string;
  private readonly logger: Logger;

  private readonly locks = new KeyedMutex();
  private readonly tasks = new Map<Id, CollaborationTask>();

  constructor(options: CollaborationManagerOptions) {
    this.registry = options.registry;
    this.knowledge = options.knowledge;
    this.loads = options.loads ?? new LoadTracker();
    this.reviewersPerTask = options.reviewersPerTask ?? DEFAULT_REVIEWERS_PER_TASK;
    this.reviewTimeoutMs = options.reviewTimeoutMs ?? DEFAULT_REVIEW_TIMEOUT_MS;
    this.maxRetainedTasks = options.maxRetainedTasks ?? DEFAULT_MAX_RETAINED_TASKS;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
    this.logger = options.logger ?? consoleLogger;
  }

  // ==========================================================================
  // Knowledge
  // ==========================================================================

  /**
   * Validate and append a knowledge item. A later item on the same topic
   * supersedes the current one.
   *
   * @throws ValidationError when the input is malformed
   */
  async publishKnowledge(input: unknown): Promise<KnowledgeItem> {
    const result = validatePublishKnowledgeInput(input);
    if (!result.valid) {
      throw new ValidationError(
        `Invalid knowledge item: ${result.errors.map((e) => `${e.path || '(root)'}: ${e.message}`).join('; ')}`,
        { details: { errors: result.errors } }
      );
    }
    const value = result.value;

    const lockKeys = [...value.domainTags.map((tag) => `tag:${tag}`), `topic:${value.topic}`];

    return this.locks.runExclusiveMany(lockKeys, async () => {
      const current = await this.currentItemForTopic(value.topic);

      const item: KnowledgeItem = {
        id: this.generateId(),
        sourceAgentId: value.sourceAgentId,
        knowledgeType: value.knowledgeType,
        topic: value.topic,
        content: value.content,
        confidence: value.confidence,
        domainTags: Array.from(new Set(value.domainTags)),
        createdAt: new Date(this.now()).toISOString(),
      };
      if (current) {
        item.supersedes = current.id;
      }

      await this.knowledge.append(item);
      this.logger.info('Published knowledge', {
        id: item.id,
        topic: item.topic,
        sourceAgentId: item.sourceAgentId,
        supersedes: item.supersedes,
      });
      return item;
    });
  }

  /**
   * Knowledge matching `query`, highest confidence first, then newest.
   * Reads take no lock.
   */
  async searchKnowledge(query: KnowledgeQuery = {}): Promise<KnowledgeItem[]> {
    const minConfidence = query.minConfidence ?? DEFAULT_MIN_CONFIDENCE;

    const candidates = (
      await this.knowledge.list({
        tags: query.tags,
        knowledgeType: query.knowledgeType,
        topic: query.topic,
      })
    ).filter((item) => item.confidence >= minConfidence);

    let visible = candidates;
    if (!query.includeSuperseded) {
      const superseded = await this.supersededIds(new Set(candidates.map((item) => item.topic)));
      visible = candidates.filter((item) => !superseded.has(item.id));
    }

    const sorted = visible.sort(
      (a, b) => b.confidence - a.confidence || b.createdAt.localeCompare(a.createdAt)
    );
    return query.limit === undefined ? sorted : sorted.slice(0, query.limit);
  }

  private async currentItemForTopic(topic: string): Promise<KnowledgeItem | undefined> {
    const items = await this.knowledge.list({ topic });
    const superseded = new Set(items.flatMap((item) => (item.supersedes ? [item.supersedes] : [])));

    let latest: KnowledgeItem | undefined;
    for (const item of items) {
      if (superseded.has(item.id)) continue;
      if (!latest || item.createdAt >= latest.createdAt) latest = item;
    }
    return latest;
  }

  private async supersededIds(topics: Set<string>): Promise<Set<Id>> {
    const ids = new Set<Id>();
    for (const topic of topics) {
      for (const item of await this.knowledge.list({ topic })) {
        if (item.supersedes) ids.add(item.supersedes);
      }
    }
    return ids;
  }

  // ==========================================================================
  // Experts
  // ==========================================================================

  /**
   * Least loaded agent with a matching available capability name,
   * capability domain tag or expertise domain. Ties go to the lowest id.
   */
  findExpert(capabilityOrTag: string, excludeAgentId?: Id): Id | null {
    const matches = this.registry.runtimes().filter((agent) => {
      const { descriptor } = agent;
      if (descriptor.agentId === excludeAgentId) return false;
      if (descriptor.expertiseDomains.includes(capabilityOrTag)) return true;
      return descriptor.capabilities.some(
        (c) => c.available && (c.name === capabilityOrTag || (c.domainTags ?? []).includes(capabilityOrTag))
      );
    });

    const [best] = this.rankByLoad(matches);
    return best ? best.descriptor.agentId : null;
  }

  private rankByLoad(agents: AgentRuntime[]): AgentRuntime[] {
    return [...agents].sort(
      (a, b) =>
        this.loads.load(a.descriptor.agentId) - this.loads.load(b.descriptor.agentId) ||
        compareIds(a.descriptor.agentId, b.descriptor.agentId)
    );
  }

  // ==========================================================================
  // Peer review
  // ==========================================================================

  /**
   * Ask up to `reviewers` agents (never the initiator) to review `payload`.
   *
   * Resolves to the finished task: `resolved` when more than half of the
   * chosen reviewers approve, otherwise `conflicted`. A reviewer that
   * fails or misses the deadline counts as no vote.
   */
  async initiatePeerReview(
    initiatorAgentId: Id,
    payload: unknown,
    options: PeerReviewOptions = {}
  ): Promise<CollaborationTask> {
    const wanted = options.reviewers ?? this.reviewersPerTask;
    const timeoutMs = options.timeoutMs ?? this.reviewTimeoutMs;
    const reviewers = this.pickReviewers(initiatorAgentId, wanted);
    const createdAt = this.timestamp();

    let task: CollaborationTask = {
      taskId: this.generateId(),
      initiatorAgentId,
      payload,
      reviewerAgentIds: reviewers.map((r) => r.descriptor.agentId),
      status: 'pending',
      reviews: [],
      createdAt,
      updatedAt: createdAt,
    };
    this.tasks.set(task.taskId, task);

    const logger = withLogContext(this.logger, { taskId: task.taskId, initiatorAgentId });

    if (reviewers.length === 0) {
      task = this.store(
        transitionTask(task, 'conflicted', this.timestamp(), {
          resolution: {
            decision: 'conflicted',
            approvals: 0,
            rejections: 0,
            revisions: 0,
            summary: 'no reviewer available',
          },
        })
      );
      logger.warn('Peer review conflicted: no reviewer available');
      return task;
    }

    task = this.store(transitionTask(task, 'in_review', this.timestamp()));
    logger.debug('Peer review started', { reviewers: task.reviewerAgentIds });

    const current = task;
    const reviews = await Promise.all(
      reviewers.map((reviewer) => this.collectReview(reviewer, current, timeoutMs, logger))
    );

    const resolution = resolve(reviews);
    task = this.store(
      transitionTask(task, resolution.decision === 'approved' ? 'resolved' : 'conflicted', this.timestamp(), {
        reviews,
        resolution,
      })
    );

    logger.info(`Peer review ${task.status}`, {
      approvals: resolution.approvals,
      rejections: resolution.rejections,
      revisions: resolution.revisions,
    });
    return task;
  }

  getTask(taskId: Id): CollaborationTask | undefined {
    const task = this.tasks.get(taskId);
    return task ? copyTask(task) : undefined;
  }

  /**
   * Retained tasks, oldest first
   */
  listTasks(): CollaborationTask[] {
    return Array.from(this.tasks.values(), copyTask);
  }

  /**
   * Reviewers ranked the way findExpert ranks experts. Agents already at
   * their concurrency limit are skipped.
   */
  private pickReviewers(initiatorAgentId: Id, count: number): AgentRuntime[] {
    const eligible = this.registry.runtimes().filter((agent) => {
      const { agentId, maxConcurrency } = agent.descriptor;
      if (agentId === initiatorAgentId || agent.review === undefined) return false;
      return this.loads.load(agentId) < maxConcurrency;
    });
    return this.rankByLoad(eligible).slice(0, Math.max(0, count));
  }

  private async collectReview(
    reviewer: AgentRuntime,
    task: CollaborationTask,
    timeoutMs: number,
    logger: Logger
  ): Promise<ReviewRecord> {
    const reviewerAgentId = reviewer.descriptor.agentId;
    const started = this.now();
    const release = this.loads.acquire(reviewerAgentId);

    try {
      const decision = await withTimeout(
        async (signal) => {
          if (!reviewer.review) {
            throw new Error(`agent ${reviewerAgentId} does not review`);
          }
          return reviewer.review(task.payload, {
            taskId: task.taskId,
            initiatorAgentId: task.initiatorAgentId,
            signal,
            logger: withLogContext(logger, { reviewerAgentId }),
          });
        },
        {
          timeoutMs,
          onTimeout: () => new AgentTimeoutError(reviewerAgentId, 'review', timeoutMs),
        }
      );

      const record: ReviewRecord = {
        reviewerAgentId,
        verdict: decision.verdict,
        durationMs: this.now() - started,
      };
      if (decision.comments !== undefined) record.comments = decision.comments;
      return record;
    } catch (error) {
      logger.warn('Reviewer gave no verdict', { reviewerAgentId, error: errorMessage(error) });
      return {
        reviewerAgentId,
        verdict: 'no_response',
        comments: errorMessage(error),
        durationMs: this.now() - started,
      };
    } finally {
      release();
    }
  }

  private store(task: CollaborationTask): CollaborationTask {
    this.tasks.set(task.taskId, task);
    if (isTerminal(task.status)) this.pruneTasks();
    return task;
  }

  /** Drop the oldest finished tasks once more than the limit are held */
  private pruneTasks(): void {
    let excess = this.tasks.size - this.maxRetainedTasks;
    for (const [taskId, task] of this.tasks) {
      if (excess <= 0) break;
      if (isTerminal(task.status)) {
        this.tasks.delete(taskId);
        excess--;
      }
    }
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}

function resolve(reviews: ReviewRecord[]): CollaborationResolution {
  const count = (verdict: ReviewRecord['verdict']) => reviews.filter((r) => r.verdict === verdict).length;
  const approvals = count('approve');
  const rejections = count('reject');
  const revisions = count('revise');
  const silent = count('no_response');
  const approved = approvals > reviews.length / 2;

  return {
    decision: approved ? 'approved' : 'conflicted',
    approvals,
    rejections,
    revisions,
    summary:
      `${approvals} of ${reviews.length} approved` +
      (rejections > 0 ? `, ${rejections} rejected` : '') +
      (revisions > 0 ? `, ${revisions} asked for revision` : '') +
      (silent > 0 ? `, ${silent} did not respond` : ''),
  };
}

function copyTask(task: CollaborationTask): CollaborationTask {
  const copy: CollaborationTask = {
    ...task,
    reviewerAgentIds: [...task.reviewerAgentIds],
    reviews: task.reviews.map((r) => ({ ...r })),
  };
  if (task.resolution) copy.resolution = { ...task.resolution };
  return copy;
}
