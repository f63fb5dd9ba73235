// Tests for the request router

import { describe, it, expect } from 'vitest';
import { PERMISSION_LEVELS, type PermissionLevel } from '@huddle/protocol';
import { RequestRouter, type RouteDecision, type RouteQuery } from './request-router.js';
import { createRegistryWithAgents, type MockAgentSpec } from '../testing/mock-agents.js';
import { permits } from '../access/permissions.js';
import {
  AgentUnavailableError,
  CapabilityMismatchError,
  PermissionDeniedError,
} from '../errors.js';

async function createRouter(specs: MockAgentSpec[]) {
  const { registry, agents } = await createRegistryWithAgents(specs);
  return { router: new RequestRouter({ registry }), agents };
}

describe('RequestRouter', () => {
  it('should report CapabilityMismatch when no agent exposes the action', async () => {
    const { router } = await createRouter([
      { agentType: 'learning', agentId: 'learn-1', capabilities: [{ name: 'recommend_content' }] },
    ]);

    expect(() => router.route({ action: 'predict_outcome', callerPermission: 'admin' })).toThrow(
      CapabilityMismatchError
    );
  });

  it('should report PermissionDenied when the caller is below the requirement', async () => {
    const { router } = await createRouter([
      {
        agentType: 'model',
        agentId: 'model-1',
        capabilities: [{ name: 'predict_outcome', requiredPermission: 'admin' }],
      },
    ]);

    expect(() => router.route({ action: 'predict_outcome', callerPermission: 'read_execute' })).toThrow(
      PermissionDeniedError
    );
  });

  it('should report PermissionDenied when the agent itself lacks the level', async () => {
    const { router } = await createRouter([
      {
        agentType: 'model',
        agentId: 'model-1',
        permissionLevel: 'read_execute',
        capabilities: [{ name: 'retrain', requiredPermission: 'read_execute_write' }],
      },
    ]);

    try {
      router.route({ action: 'retrain', callerPermission: 'admin' });
      expect.unreachable('route should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(PermissionDeniedError);
      if (error instanceof PermissionDeniedError) {
        expect(error.message).toContain('agent model-1');
      }
    }
  });

  it('should skip unavailable capabilities', async () => {
    const { router } = await createRouter([
      {
        agentType: 'model',
        agentId: 'model-1',
        capabilities: [{ name: 'predict', available: false, unavailableReason: 'model failed to load' }],
      },
      { agentType: 'model', agentId: 'model-2', capabilities: [{ name: 'predict' }] },
    ]);

    expect(router.route({ action: 'predict', callerPermission: 'admin' }).agent.descriptor.agentId).toBe(
      'model-2'
    );
  });

  it('should report AgentUnavailable when every exposing capability is unavailable', async () => {
    const { router } = await createRouter([
      {
        agentType: 'model',
        agentId: 'model-1',
        capabilities: [{ name: 'predict', available: false, unavailableReason: 'model failed to load' }],
      },
    ]);

    expect(() => router.route({ action: 'predict', callerPermission: 'admin' })).toThrow(
      /model-1: model failed to load/
    );
  });

  it('should skip saturated agents and report when all are saturated', async () => {
    const { router } = await createRouter([
      { agentType: 'a', agentId: 'a-1', maxConcurrency: 1, capabilities: [{ name: 'work' }] },
      { agentType: 'a', agentId: 'a-2', maxConcurrency: 1, capabilities: [{ name: 'work' }] },
    ]);

    const first = router.reserve({ action: 'work', callerPermission: 'admin' });
    const second = router.reserve({ action: 'work', callerPermission: 'admin' });

    expect(first.agent.descriptor.agentId).toBe('a-1');
    expect(second.agent.descriptor.agentId).toBe('a-2');
    expect(() => router.route({ action: 'work', callerPermission: 'admin' })).toThrow(AgentUnavailableError);

    first.release();
    first.release();
    expect(router.loads.load('a-1')).toBe(0);
    expect(router.route({ action: 'work', callerPermission: 'admin' }).agent.descriptor.agentId).toBe('a-1');
  });

  it('should break ties by type, load, estimate, then id', async () => {
    const { router } = await createRouter([
      { agentType: 'fast', agentId: 'z-fast', capabilities: [{ name: 'work', executionTimeEstimateMs: 10 }] },
      { agentType: 'slow', agentId: 'b-slow', capabilities: [{ name: 'work', executionTimeEstimateMs: 500 }] },
      { agentType: 'slow', agentId: 'a-slow', capabilities: [{ name: 'work', executionTimeEstimateMs: 500 }] },
    ]);

    const ids = (agentType?: string) =>
      router
        .rankCandidates({ action: 'work', callerPermission: 'admin', agentType })
        .map((c) => c.agent.descriptor.agentId);

    expect(ids()).toEqual(['z-fast', 'a-slow', 'b-slow']);
    expect(ids('slow')).toEqual(['a-slow', 'b-slow', 'z-fast']);
    expect(ids('unspecified')).toEqual(['z-fast', 'a-slow', 'b-slow']);

    const release = router.loads.acquire('z-fast');
    expect(ids()).toEqual(['a-slow', 'b-slow', 'z-fast']);
    release();
  });

  it('should exclude agents when retrying against an alternate', async () => {
    const { router } = await createRouter([
      { agentType: 'a', agentId: 'a-1', capabilities: [{ name: 'work' }] },
    ]);

    expect(() => router.route({ action: 'work', callerPermission: 'admin', exclude: ['a-1'] })).toThrow(
      AgentUnavailableError
    );
  });
});

// --- Property test over generated registries ---

/**
 * Deterministic PRNG (mulberry32) so failures reproduce
 */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const ACTIONS = ['predict', 'summarize', 'explain', 'rank', 'fetch'];

function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

function generateSpecs(random: () => number): MockAgentSpec[] {
  const count = 1 + Math.floor(random() * 6);
  return Array.from({ length: count }, (_, i) => ({
    agentType: `type-${Math.floor(random() * 3)}`,
    agentId: `agent-${i}`,
    permissionLevel: pick(random, PERMISSION_LEVELS),
    maxConcurrency: 1 + Math.floor(random() * 2),
    capabilities: ACTIONS.filter(() => random() < 0.5).map((name) => ({
      name,
      requiredPermission: pick(random, PERMISSION_LEVELS),
      available: random() < 0.8,
      executionTimeEstimateMs: Math.floor(random() * 1000),
    })),
  }));
}

function routeOrError(router: RequestRouter, query: RouteQuery): RouteDecision | Error {
  try {
    return router.route(query);
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}

describe('RequestRouter properties', () => {
  it('should never select an agent lacking the capability or the permission', async () => {
    const random = createRandom(20240901);

    for (let round = 0; round < 200; round++) {
      const specs = generateSpecs(random);
      const { router } = await createRouter(specs);
      const action = pick(random, ACTIONS);
      const callerPermission: PermissionLevel = pick(random, PERMISSION_LEVELS);

      // Occupy some slots so saturation is exercised too
      for (const spec of specs) {
        if (random() < 0.3) router.loads.acquire(spec.agentId);
      }

      const decision = routeOrError(router, { action, callerPermission });
      if (decision instanceof Error) {
        const expectedKinds = [CapabilityMismatchError, AgentUnavailableError, PermissionDeniedError];
        expect(expectedKinds.some((kind) => decision instanceof kind)).toBe(true);
        continue;
      }

      for (const candidate of decision.candidates) {
        const { descriptor } = candidate.agent;
        const capability = descriptor.capabilities.find((c) => c.name === action);

        expect(capability).toBeDefined();
        expect(capability?.available).toBe(true);
        expect(permits(callerPermission, capability?.requiredPermission)).toBe(true);
        expect(permits(descriptor.permissionLevel, capability?.requiredPermission)).toBe(true);
        expect(router.loads.load(descriptor.agentId)).toBeLessThan(descriptor.maxConcurrency);
      }
    }
  });
});
