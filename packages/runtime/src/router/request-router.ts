// Request router - picks the agent that services an action
//
// Candidates must pass four gates, checked in order so the failure names
// the gate that emptied the set:
//   1. some agent exposes the action       else CapabilityMismatch
//   2. the capability is available         else AgentUnavailable
//   3. caller and agent both permit it     else PermissionDenied
//   4. the agent is under its concurrency  else AgentUnavailable
// Survivors are ranked: exact agent-type match, lowest load, lowest time
// estimate, then agent id.

import {
  UNSPECIFIED_AGENT_TYPE,
  type Capability,
  type Id,
  type PermissionLevel,
} from '@huddle/protocol';
import type { AgentRuntime } from '../agents/types.js';
import type { CapabilityRegistry } from '../registry/capability-registry.js';
import { compareIds } from '../registry/capability-registry.js';
import { comparePermissionLevels, permits } from '../access/permissions.js';
import {
  AgentUnavailableError,
  CapabilityMismatchError,
  PermissionDeniedError,
} from '../errors.js';
import { LoadTracker } from './load-tracker.js';

/**
 * What to route
 */
export type RouteQuery = {
  action: string;

  /** Preferred agent type; 'unspecified' or absent for none */
  agentType?: string;

  /** Level held by the caller */
  callerPermission: PermissionLevel;

  /** Agents to skip (used when retrying against an alternate) */
  exclude?: Id[];
};

export type RouteCandidate = {
  agent: AgentRuntime;
  capability: Capability;
  load: number;
};

export type RouteDecision = RouteCandidate & {
  /** All ranked candidates, the chosen one first */
  candidates: RouteCandidate[];
};

/**
 * A routed invocation holding a load slot
 */
export type Reservation = RouteDecision & {
  release: () => void;
};

export type RequestRouterOptions = {
  registry: CapabilityRegistry;
  loadTracker?: LoadTracker;
};

export class RequestRouter {
  private readonly registry: CapabilityRegistry;
  readonly loads: LoadTracker;

  constructor(options: RequestRouterOptions) {
    this.registry = options.registry;
    this.loads = options.loadTracker ?? new LoadTracker();
  }

  /**
   * Select the best candidate for an action.
   *
   * @throws CapabilityMismatchError, AgentUnavailableError or PermissionDeniedError
   */
  route(query: RouteQuery): RouteDecision {
    const candidates = this.rankCandidates(query);
    return { ...candidates[0], candidates };
  }

  /**
   * Route and take a load slot on the chosen agent in one step.
   */
  reserve(query: RouteQuery): Reservation {
    const decision = this.route(query);
    const release = this.loads.acquire(decision.agent.descriptor.agentId);
    return { ...decision, release };
  }

  /**
   * All agents passing the gates, best first. Never empty.
   */
  rankCandidates(query: RouteQuery): RouteCandidate[] {
    const { action } = query;
    const excluded = new Set(query.exclude ?? []);

    const exposing: RouteCandidate[] = [];
    for (const agent of this.registry.runtimes()) {
      const capability = agent.descriptor.capabilities.find((c) => c.name === action);
      if (capability) {
        exposing.push({ agent, capability, load: this.loads.load(agent.descriptor.agentId) });
      }
    }

    if (exposing.length === 0) {
      throw new CapabilityMismatchError(action);
    }

    const remaining = exposing.filter((c) => !excluded.has(c.agent.descriptor.agentId));
    if (remaining.length === 0) {
      throw new AgentUnavailableError(action, 'no alternate agent exposes this capability');
    }

    const available = remaining.filter((c) => c.capability.available);
    if (available.length === 0) {
      const reasons = remaining.map(
        (c) => `${c.agent.descriptor.agentId}: ${c.capability.unavailableReason ?? 'unavailable'}`
      );
      throw new AgentUnavailableError(action, reasons.join('; '));
    }

    const callerPermitted = available.filter((c) =>
      permits(query.callerPermission, c.capability.requiredPermission)
    );
    if (callerPermitted.length === 0) {
      const required = available
        .map((c) => c.capability.requiredPermission)
        .sort(comparePermissionLevels)[0];
      throw new PermissionDeniedError(action, query.callerPermission, required);
    }

    const permitted = callerPermitted.filter((c) =>
      permits(c.agent.descriptor.permissionLevel, c.capability.requiredPermission)
    );
    if (permitted.length === 0) {
      const first = callerPermitted[0];
      throw new PermissionDeniedError(
        action,
        first.agent.descriptor.permissionLevel,
        first.capability.requiredPermission,
        `agent ${first.agent.descriptor.agentId}`
      );
    }

    const unsaturated = permitted.filter((c) => c.load < c.agent.descriptor.maxConcurrency);
    if (unsaturated.length === 0) {
      throw new AgentUnavailableError(action, 'all candidate agents are at their concurrency limit');
    }

    const preferredType =
      query.agentType && query.agentType !== UNSPECIFIED_AGENT_TYPE ? query.agentType : undefined;

    return unsaturated.sort((a, b) => compareCandidates(a, b, preferredType));
  }
}

function compareCandidates(a: RouteCandidate, b: RouteCandidate, preferredType?: string): number {
  if (preferredType) {
    const aMatch = a.agent.descriptor.agentType === preferredType ? 0 : 1;
    const bMatch = b.agent.descriptor.agentType === preferredType ? 0 : 1;
    if (aMatch !== bMatch) return aMatch - bMatch;
  }
  return (
    a.load - b.load ||
    a.capability.executionTimeEstimateMs - b.capability.executionTimeEstimateMs ||
    compareIds(a.agent.descriptor.agentId, b.agent.descriptor.agentId)
  );
}
