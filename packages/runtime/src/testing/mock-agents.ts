// Test fixtures for agents

import { vi } from 'vitest';
import type { CapabilityDefinition, Params, PermissionLevel } from '@huddle/protocol';
import type { AgentExecutionContext, ReviewDecision } from '../agents/types.js';
import { BaseAgent, type AgentCapabilitySpec, type CapabilityHandler } from '../agents/base-agent.js';
import { CapabilityRegistry } from '../registry/capability-registry.js';
import { silentLogger } from '../logger.js';

export type MockAgentSpec = {
  agentType: string;
  agentId: string;
  permissionLevel?: PermissionLevel;
  maxConcurrency?: number;
  expertiseDomains?: string[];
  capabilities: Array<
    Partial<CapabilityDefinition> & {
      name: string;
      available?: boolean;
      unavailableReason?: string;
      handler?: CapabilityHandler;
    }
  >;
  review?: (payload: unknown) => Promise<ReviewDecision>;
  peerReviewActions?: string[];
};

/**
 * Agent whose handlers default to echoing their params
 */
export class MockAgent extends BaseAgent {
  readonly executeSpy = vi.fn<(action: string, params: Params) => void>();
  readonly review?: (payload: unknown) => Promise<ReviewDecision>;
  private readonly peerReviewActions: Set<string>;

  constructor(spec: MockAgentSpec) {
    const capabilities: AgentCapabilitySpec[] = spec.capabilities.map((c) => ({
      name: c.name,
      description: c.description ?? `${c.name} capability`,
      requiredPermission: c.requiredPermission ?? 'read_only',
      executionTimeEstimateMs: c.executionTimeEstimateMs ?? 100,
      domainTags: c.domainTags,
      available: c.available,
      unavailableReason: c.unavailableReason,
      handler: c.handler ?? (async (params: Params) => ({ echo: params })),
    }));

    super({
      agentType: spec.agentType,
      agentId: spec.agentId,
      name: `Mock ${spec.agentId}`,
      permissionLevel: spec.permissionLevel ?? 'admin',
      capabilities,
      maxConcurrency: spec.maxConcurrency,
      expertiseDomains: spec.expertiseDomains,
    });

    this.review = spec.review;
    this.peerReviewActions = new Set(spec.peerReviewActions ?? []);
  }

  async execute(action: string, params: Params, ctx: AgentExecutionContext): Promise<unknown> {
    this.executeSpy(action, params);
    return super.execute(action, params, ctx);
  }

  wantsPeerReview(action: string): boolean {
    return this.peerReviewActions.has(action);
  }
}

/**
 * Register and create each mock agent under its own type, then freeze.
 * Agents sharing a type share one registration.
 */
export async function createRegistryWithAgents(specs: MockAgentSpec[]): Promise<{
  registry: CapabilityRegistry;
  agents: Map<string, MockAgent>;
}> {
  const registry = new CapabilityRegistry({ logger: silentLogger });
  const agents = new Map<string, MockAgent>();
  const byType = new Map<string, MockAgentSpec[]>();

  for (const spec of specs) {
    byType.set(spec.agentType, [...(byType.get(spec.agentType) ?? []), spec]);
  }

  for (const [agentType, typeSpecs] of byType) {
    registry.register(agentType, {
      factory: ({ agentId }) => {
        const spec = typeSpecs.find((s) => s.agentId === agentId);
        if (!spec) throw new Error(`no mock spec for ${agentId}`);
        const agent = new MockAgent(spec);
        agents.set(agentId, agent);
        return agent;
      },
    });
  }

  for (const spec of specs) {
    await registry.create(spec.agentType, spec.agentId);
  }
  registry.freeze();

  return { registry, agents };
}

export function createMockExecutionContext(
  overrides: Partial<AgentExecutionContext> = {}
): AgentExecutionContext {
  return {
    requestId: 'req-1',
    subtaskId: 'main',
    userContext: { userId: 'user-1' },
    signal: new AbortController().signal,
    logger: silentLogger,
    dependencyResults: {},
    ...overrides,
  };
}
