// Orchestrator performance counters

import type { Id, ResponseStatus } from '@huddle/protocol';

export type InvocationOutcome = 'success' | 'failure' | 'timeout';

export type AgentMetrics = {
  invocations: number;
  successes: number;
  /** Includes timeouts */
  failures: number;
  timeouts: number;
  meanLatencyMs: number;
};

export type GlobalMetrics = {
  requests: number;
  successes: number;
  partialSuccesses: number;
  failures: number;
  timeouts: number;
  meanLatencyMs: number;
};

export type MetricsSnapshot = {
  global: GlobalMetrics;
  agents: Record<Id, AgentMetrics>;
};

export class OrchestratorMetrics {
  private readonly agents = new Map<Id, AgentMetrics & { totalLatencyMs: number }>();
  private readonly requests = {
    count: 0,
    successes: 0,
    partialSuccesses: 0,
    failures: 0,
    timeouts: 0,
    totalLatencyMs: 0,
  };

  recordInvocation(agentId: Id, outcome: InvocationOutcome, durationMs: number): void {
    const entry = this.agents.get(agentId) ?? {
      invocations: 0,
      successes: 0,
      failures: 0,
      timeouts: 0,
      meanLatencyMs: 0,
      totalLatencyMs: 0,
    };

    entry.invocations++;
    entry.totalLatencyMs += durationMs;
    entry.meanLatencyMs = entry.totalLatencyMs / entry.invocations;
    if (outcome === 'success') {
      entry.successes++;
    } else {
      entry.failures++;
      if (outcome === 'timeout') {
        entry.timeouts++;
        this.requests.timeouts++;
      }
    }
    this.agents.set(agentId, entry);
  }

  recordRequest(status: ResponseStatus, durationMs: number): void {
    this.requests.count++;
    this.requests.totalLatencyMs += durationMs;
    if (status === 'success') this.requests.successes++;
    else if (status === 'partial_success') this.requests.partialSuccesses++;
    else this.requests.failures++;
  }

  snapshot(): MetricsSnapshot {
    const { count, totalLatencyMs, successes, partialSuccesses, failures, timeouts } = this.requests;
    const agents: Record<Id, AgentMetrics> = {};
    for (const [agentId, entry] of this.agents) {
      agents[agentId] = {
        invocations: entry.invocations,
        successes: entry.successes,
        failures: entry.failures,
        timeouts: entry.timeouts,
        meanLatencyMs: entry.meanLatencyMs,
      };
    }

    return {
      global: {
        requests: count,
        successes,
        partialSuccesses,
        failures,
        timeouts,
        meanLatencyMs: count === 0 ? 0 : totalLatencyMs / count,
      },
      agents,
    };
  }
}
