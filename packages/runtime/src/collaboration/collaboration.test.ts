import { describe, it, expect, beforeEach } from 'vitest';
import type { CollaborationTask } from '@huddle/protocol';
import { createInMemoryRepositoryContext, type InMemoryRepositoryContext } from '@huddle/repositories';
import { silentLogger } from '../logger.js';
import { InvalidTaskTransitionError, ValidationError } from '../errors.js';
import { LoadTracker } from '../router/load-tracker.js';
import { createRegistryWithAgents, type MockAgentSpec } from '../testing/mock-agents.js';
import { CollaborationManager, type CollaborationManagerOptions } from './collaboration-manager.js';
import { transitionTask } from './review-task.js';

const approve = async () => ({ verdict: 'approve' as const });
const reject = async () => ({ verdict: 'reject' as const, comments: 'numbers do not add up' });

function knowledge(overrides: Record<string, unknown> = {}) {
  return {
    sourceAgentId: 'insight-1',
    knowledgeType: 'insight',
    topic: 'home field advantage',
    content: 'Home teams win more often',
    confidence: 0.8,
    domainTags: ['analytics'],
    ...overrides,
  };
}

describe('CollaborationManager', () => {
  let repos: InMemoryRepositoryContext;
  let clock: number;
  let nextId: number;

  async function createManager(
    specs: MockAgentSpec[],
    loads = new LoadTracker(),
    options: Partial<CollaborationManagerOptions> = {}
  ) {
    const { registry } = await createRegistryWithAgents(specs);
    return new CollaborationManager({
      registry,
      knowledge: repos.knowledge,
      loads,
      now: () => clock,
      generateId: () => `id-${++nextId}`,
      logger: silentLogger,
      ...options,
    });
  }

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
    clock = Date.UTC(2024, 8, 1);
    nextId = 0;
  });

  describe('knowledge', () => {
    it('should reject confidence outside [0, 1]', async () => {
      const manager = await createManager([]);

      await expect(manager.publishKnowledge(knowledge({ confidence: 1.5 }))).rejects.toThrow(ValidationError);
      expect(repos._data.knowledge.size).toBe(0);
    });

    it('should supersede the current item on the same topic', async () => {
      const manager = await createManager([]);

      const first = await manager.publishKnowledge(knowledge());
      clock += 1_000;
      const second = await manager.publishKnowledge(knowledge({ content: 'Home teams win 57% of games' }));
      clock += 1_000;
      const third = await manager.publishKnowledge(knowledge({ content: 'Home teams win 58% of games' }));

      expect(first.supersedes).toBeUndefined();
      expect(second.supersedes).toBe(first.id);
      expect(third.supersedes).toBe(second.id);
      expect(third.createdAt).toBe('2024-09-01T00:00:02.000Z');

      const current = await manager.searchKnowledge({ tags: ['analytics'] });
      expect(current.map((k) => k.id)).toEqual([third.id]);

      const all = await manager.searchKnowledge({ tags: ['analytics'], includeSuperseded: true });
      expect(all.map((k) => k.id)).toEqual([third.id, second.id, first.id]);
    });

    it('should filter by confidence and sort by confidence then recency', async () => {
      const manager = await createManager([]);

      await manager.publishKnowledge(knowledge({ topic: 'a', confidence: 0.4 }));
      const b = await manager.publishKnowledge(knowledge({ topic: 'b', confidence: 0.6 }));
      clock += 1;
      const c = await manager.publishKnowledge(knowledge({ topic: 'c', confidence: 0.9 }));
      clock += 1;
      const d = await manager.publishKnowledge(knowledge({ topic: 'd', confidence: 0.6 }));

      const results = await manager.searchKnowledge();
      expect(results.map((k) => k.id)).toEqual([c.id, d.id, b.id]);

      const limited = await manager.searchKnowledge({ minConfidence: 0.3, limit: 2 });
      expect(limited.map((k) => k.id)).toEqual([c.id, d.id]);
    });

    it('should search by tag and type', async () => {
      const manager = await createManager([]);

      const warning = await manager.publishKnowledge(
        knowledge({ topic: 'stale data', knowledgeType: 'warning', domainTags: ['data_quality'] })
      );
      await manager.publishKnowledge(knowledge({ topic: 'other' }));

      expect((await manager.searchKnowledge({ tags: ['data_quality'] })).map((k) => k.id)).toEqual([warning.id]);
      expect((await manager.searchKnowledge({ knowledgeType: 'warning' })).map((k) => k.id)).toEqual([warning.id]);
    });
  });

  describe('findExpert', () => {
    const specs: MockAgentSpec[] = [
      {
        agentType: 'model_engine',
        agentId: 'model-1',
        capabilities: [{ name: 'predict_game_outcome', domainTags: ['predictions'] }],
      },
      {
        agentType: 'model_engine',
        agentId: 'model-2',
        capabilities: [{ name: 'predict_game_outcome', domainTags: ['predictions'] }],
      },
      {
        agentType: 'insight_generator',
        agentId: 'insight-1',
        expertiseDomains: ['analytics'],
        capabilities: [{ name: 'generate_insights', available: false, unavailableReason: 'offline' }],
      },
    ];

    it('should prefer the least loaded match', async () => {
      const loads = new LoadTracker();
      const manager = await createManager(specs, loads);

      expect(manager.findExpert('predictions')).toBe('model-1');
      loads.acquire('model-1');
      expect(manager.findExpert('predict_game_outcome')).toBe('model-2');
    });

    it('should honour the exclusion and skip unavailable capabilities', async () => {
      const manager = await createManager(specs);

      expect(manager.findExpert('predictions', 'model-1')).toBe('model-2');
      expect(manager.findExpert('generate_insights')).toBeNull();
      expect(manager.findExpert('analytics')).toBe('insight-1');
      expect(manager.findExpert('unknown')).toBeNull();
    });
  });

  describe('initiatePeerReview', () => {
    const initiator: MockAgentSpec = {
      agentType: 'insight_generator',
      agentId: 'insight-1',
      capabilities: [{ name: 'generate_insights' }],
      review: approve,
    };

    it('should conflict when the single reviewer rejects', async () => {
      const manager = await createManager([
        initiator,
        { agentType: 'quality_assurance', agentId: 'qa-1', capabilities: [{ name: 'validate_result' }], review: reject },
      ]);

      const task = await manager.initiatePeerReview('insight-1', { insight: 'x' }, { reviewers: 1 });

      expect(task.status).toBe('conflicted');
      expect(task.reviewerAgentIds).toEqual(['qa-1']);
      expect(task.reviews).toEqual([
        { reviewerAgentId: 'qa-1', verdict: 'reject', comments: 'numbers do not add up', durationMs: 0 },
      ]);
      expect(task.resolution).toEqual({
        decision: 'conflicted',
        approvals: 0,
        rejections: 1,
        revisions: 0,
        summary: '0 of 1 approved, 1 rejected',
      });
    });

    it('should resolve on a majority of approvals', async () => {
      const manager = await createManager([
        initiator,
        { agentType: 'qa', agentId: 'qa-1', capabilities: [{ name: 'validate_result' }], review: approve },
        { agentType: 'qa', agentId: 'qa-2', capabilities: [{ name: 'validate_result' }], review: approve },
        { agentType: 'qa', agentId: 'qa-3', capabilities: [{ name: 'validate_result' }], review: reject },
      ]);

      const task = await manager.initiatePeerReview('insight-1', {}, { reviewers: 3 });

      expect(task.status).toBe('resolved');
      expect(task.reviewerAgentIds).toEqual(['qa-1', 'qa-2', 'qa-3']);
      expect(task.resolution?.summary).toBe('2 of 3 approved, 1 rejected');
    });

    it('should count a silent reviewer as no vote', async () => {
      const manager = await createManager([
        initiator,
        {
          agentType: 'qa',
          agentId: 'qa-1',
          capabilities: [{ name: 'validate_result' }],
          review: () => new Promise(() => {}),
        },
      ]);

      const task = await manager.initiatePeerReview('insight-1', {}, { timeoutMs: 10 });

      expect(task.status).toBe('conflicted');
      expect(task.reviews[0].verdict).toBe('no_response');
      expect(task.resolution?.summary).toBe('0 of 1 approved, 1 did not respond');
    });

    it('should conflict immediately without an eligible reviewer', async () => {
      const manager = await createManager([
        initiator,
        { agentType: 'model_engine', agentId: 'model-1', capabilities: [{ name: 'predict_game_outcome' }] },
      ]);

      const task = await manager.initiatePeerReview('insight-1', {});

      expect(task.status).toBe('conflicted');
      expect(task.reviewerAgentIds).toEqual([]);
      expect(task.resolution?.summary).toBe('no reviewer available');
    });

    it('should keep tasks for lookup', async () => {
      const manager = await createManager([
        initiator,
        { agentType: 'qa', agentId: 'qa-1', capabilities: [{ name: 'validate_result' }], review: approve },
      ]);

      const task = await manager.initiatePeerReview('insight-1', { a: 1 });
      const stored = manager.getTask(task.taskId);
      stored?.reviews.push({ reviewerAgentId: 'intruder', verdict: 'approve', durationMs: 0 });

      expect(manager.getTask(task.taskId)?.reviews).toHaveLength(1);
      expect(manager.listTasks().map((t) => t.status)).toEqual(['resolved']);
      expect(manager.getTask('missing')).toBeUndefined();
    });

    it('should drop the oldest finished tasks beyond the retention limit', async () => {
      const manager = await createManager(
        [initiator, { agentType: 'qa', agentId: 'qa-1', capabilities: [{ name: 'validate_result' }], review: approve }],
        new LoadTracker(),
        { maxRetainedTasks: 2 }
      );

      for (let i = 0; i < 3; i++) {
        await manager.initiatePeerReview('insight-1', { round: i });
      }

      expect(manager.listTasks().map((t) => t.taskId)).toEqual(['id-2', 'id-3']);
      expect(manager.getTask('id-1')).toBeUndefined();
    });

    it('should rank reviewers by load and skip saturated agents', async () => {
      const loads = new LoadTracker();
      const manager = await createManager(
        [
          initiator,
          {
            agentType: 'qa',
            agentId: 'qa-1',
            maxConcurrency: 1,
            capabilities: [{ name: 'validate_result' }],
            review: approve,
          },
          { agentType: 'qa', agentId: 'qa-2', maxConcurrency: 4, capabilities: [{ name: 'validate_result' }], review: approve },
          { agentType: 'qa', agentId: 'qa-3', maxConcurrency: 4, capabilities: [{ name: 'validate_result' }], review: approve },
        ],
        loads
      );
      loads.acquire('qa-1');
      loads.acquire('qa-2');

      const task = await manager.initiatePeerReview('insight-1', {}, { reviewers: 3 });

      expect(task.reviewerAgentIds).toEqual(['qa-3', 'qa-2']);
      expect(task.status).toBe('resolved');
    });
  });

  describe('transitionTask', () => {
    const task: CollaborationTask = {
      taskId: 't-1',
      initiatorAgentId: 'a',
      payload: null,
      reviewerAgentIds: [],
      status: 'resolved',
      reviews: [],
      createdAt: '2024-09-01T00:00:00.000Z',
      updatedAt: '2024-09-01T00:00:00.000Z',
    };

    it('should refuse to leave a terminal status', () => {
      expect(() => transitionTask(task, 'in_review', task.updatedAt)).toThrow(InvalidTaskTransitionError);
    });

    it('should refuse to skip review', () => {
      expect(() => transitionTask({ ...task, status: 'pending' }, 'resolved', task.updatedAt)).toThrow(
        'Cannot move collaboration task t-1 from "pending" to "resolved"'
      );
    });
  });
});
