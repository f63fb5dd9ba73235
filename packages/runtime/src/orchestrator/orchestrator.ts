// Orchestrator - the single entry point: submit(request) -> AgentResponse
//
// Pipeline per request:
//   validate -> role + optimized context -> memory enhancement -> plan
//   -> execute subtasks on the worker pool -> peer review -> synthesize
//   -> record the turn -> metrics
//
// submit() never rejects. Every failure after validation is converted to
// data: failed subtasks are listed in the response metadata and the
// response fails only when no subtask produced a result.

import {
  validateAgentRequest,
  getRequestQuery,
  type AgentErrorInfo,
  type AgentRequest,
  type AgentResponse,
  type Id,
  type MemoryEnhancement,
  type OptimizedContext,
  type RawContext,
  type ResponseMetadata,
  type ResponseStatus,
  type SubtaskFailure,
} from '@huddle/protocol';
import type { AgentRuntime } from '../agents/types.js';
import type { CapabilityRegistry } from '../registry/capability-registry.js';
import { RequestRouter, type Reservation } from '../router/request-router.js';
import { ContextOptimizer } from '../context/context-optimizer.js';
import { estimateTokens } from '../context/tokens.js';
import type { ConversationMemory } from '../memory/conversation-memory.js';
import type { CollaborationManager } from '../collaboration/collaboration-manager.js';
import { callerPermission } from '../access/permissions.js';
import { WorkerPool } from '../concurrency/worker-pool.js';
import { withTimeout } from '../concurrency/timeout.js';
import type { Logger } from '../logger.js';
import { consoleLogger, withLogContext } from '../logger.js';
import {
  AgentTimeoutError,
  AgentUnavailableError,
  CancelledError,
  DependencyFailedError,
  InternalAgentError,
  RuntimeError,
  ValidationError,
  errorMessage,
  toAgentErrorInfo,
} from '../errors.js';
import { DEFAULT_MAX_WORKERS, DEFAULT_SUBTASK_TIMEOUT_MS } from '../config.js';
import { planRequest, type Plan, type PlannedSubtask } from './planner.js';
import { synthesize, type SubtaskResult } from './synthesis.js';
import { OrchestratorMetrics, type MetricsSnapshot } from './metrics.js';

/** Agent id reported when no single agent produced the response */
export const ORCHESTRATOR_AGENT_ID = 'orchestrator';

/**
 * Supplies the raw context for a request (notebooks, models, features...)
 */
export type ContextSource = (request: AgentRequest) => Promise<RawContext>;

export type OrchestratorOptions = {
  registry: CapabilityRegistry;
  memory: ConversationMemory;

  /** Defaults to a router over `registry` */
  router?: RequestRouter;
  contextOptimizer?: ContextOptimizer;

  /** Required for agents that ask for peer review */
  collaboration?: CollaborationManager;

  /** Defaults to an empty context */
  contextSource?: ContextSource;

  /** Concurrent agent invocations across all requests (default: 4) */
  maxWorkers?: number;

  /** Per-invocation deadline (default: 30 seconds) */
  subtaskTimeoutMs?: number;

  now?: () => number;

  /**
   * Logger for structured logging (defaults to console)
   */
  logger?: Logger;
};

type SubtaskOutcome =
  | { ok: true; result: SubtaskResult }
  | { ok: false; failure: SubtaskFailure };

/**
 * State shared by the subtasks of one request
 */
type RequestRun = {
  request: AgentRequest;
  signal: AbortSignal;
  logger: Logger;
  context: OptimizedContext;
  memory: MemoryEnhancement;
  outcomes: Map<string, Promise<SubtaskOutcome>>;
  subtasks: Map<string, PlannedSubtask>;
};

const emptyContextSource: ContextSource = async () => ({ resources: [] });

export class Orchestrator {
  private readonly memory: ConversationMemory;
  private readonly router: RequestRouter;
  private readonly contextOptimizer: ContextOptimizer;
  private readonly collaboration?: CollaborationManager;
  private readonly contextSource: ContextSource;
  private readonly pool: WorkerPool;
  private readonly subtaskTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly metrics = new OrchestratorMetrics();

  private readonly inFlight = new Map<Id, AbortController>();
  /** Latest accepted timestamp per user */
  private readonly lastTimestamps = new Map<Id, number>();

  constructor(options: OrchestratorOptions) {
    this.memory = options.memory;
    this.router = options.router ?? new RequestRouter({ registry: options.registry });
    this.contextOptimizer = options.contextOptimizer ?? new ContextOptimizer({ logger: options.logger });
    this.collaboration = options.collaboration;
    this.contextSource = options.contextSource ?? emptyContextSource;
    this.pool = new WorkerPool(options.maxWorkers ?? DEFAULT_MAX_WORKERS);
    this.subtaskTimeoutMs = options.subtaskTimeoutMs ?? DEFAULT_SUBTASK_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Run a request to completion. Never rejects.
   */
  async submit(request: AgentRequest): Promise<AgentResponse> {
    const startedAt = this.now();

    const invalid = this.checkRequest(request);
    if (invalid) {
      this.logger.warn('Rejected request', { requestId: request.requestId, error: invalid.message });
      this.metrics.recordRequest('error', 0);
      return failedResponse(request.requestId, toAgentErrorInfo(invalid), 0, emptyMetadata());
    }

    // Accepted: claim the timestamp and id before the first await
    this.lastTimestamps.set(request.userContext.userId, request.timestamp);
    const controller = new AbortController();
    this.inFlight.set(request.requestId, controller);
    const logger = withLogContext(this.logger, { requestId: request.requestId });

    try {
      const response = await this.process(request, controller.signal, logger, startedAt);
      this.metrics.recordRequest(response.metadata.status, response.durationMs);
      logger.info('Request completed', {
        status: response.metadata.status,
        durationMs: response.durationMs,
        agentsUsed: response.metadata.agentsUsed,
      });
      return response;
    } catch (error) {
      const durationMs = this.now() - startedAt;
      logger.error('Request failed', { error: errorMessage(error) });
      this.metrics.recordRequest('error', durationMs);
      return failedResponse(request.requestId, toAgentErrorInfo(error), durationMs, emptyMetadata());
    } finally {
      this.inFlight.delete(request.requestId);
    }
  }

  /**
   * Abort every pending and running subtask of a request.
   * @returns false when the request is not in flight
   */
  cancel(requestId: Id): boolean {
    const controller = this.inFlight.get(requestId);
    if (!controller || controller.signal.aborted) return false;
    controller.abort(new CancelledError(requestId));
    this.logger.info('Request cancelled', { requestId });
    return true;
  }

  getMetrics(): MetricsSnapshot {
    return this.metrics.snapshot();
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  private checkRequest(request: AgentRequest): ValidationError | undefined {
    const validation = validateAgentRequest(request);
    if (!validation.valid) {
      const issues = validation.errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message));
      return new ValidationError(`Invalid request: ${issues.join('; ')}`, { details: { issues } });
    }
    const previous = this.lastTimestamps.get(request.userContext.userId);
    if (previous !== undefined && request.timestamp < previous) {
      return new ValidationError(
        `Request timestamp ${request.timestamp} is before the user's previous request at ${previous}`,
        { field: 'timestamp' }
      );
    }
    if (this.inFlight.has(request.requestId)) {
      return new ValidationError(`Request ${request.requestId} is already in flight`, { field: 'requestId' });
    }
    return undefined;
  }

  private async process(
    request: AgentRequest,
    signal: AbortSignal,
    logger: Logger,
    startedAt: number
  ): Promise<AgentResponse> {
    const { userId } = request.userContext;
    const query = getRequestQuery(request);

    // (a) role and budgeted context
    const role = this.contextOptimizer.detectRole(query, request.userContext);
    const context = await this.contextOptimizer.loadOptimizedContext(role, await this.loadRawContext(request, logger));

    // (b) continuity from earlier turns
    const memory = await this.memory.enhanceContext(userId, query);

    // (c) plan; an invalid plan fails the whole request
    let plan: Plan;
    try {
      plan = planRequest(request);
    } catch (error) {
      const info = toAgentErrorInfo(error);
      const sessionId = await this.recordTurn(request, role, context, info.message, false, logger);
      return failedResponse(request.requestId, info, this.now() - startedAt, {
        ...emptyMetadata(),
        role,
        sessionId,
        tokensUsed: context.estimatedTokens,
      });
    }

    logger.debug('Planned request', {
      role,
      subtasks: plan.subtasks.map((s) => `${s.id}:${s.action}`),
    });

    // (d) + (e) execute, reviewing where agents ask for it
    const run: RequestRun = {
      request,
      signal,
      logger,
      context,
      memory,
      outcomes: new Map(),
      subtasks: new Map(plan.subtasks.map((s) => [s.id, s])),
    };
    const outcomes = await Promise.all(plan.subtasks.map((subtask) => this.runSubtask(subtask.id, run)));

    // (f) synthesize
    const successes: SubtaskResult[] = [];
    const failures: SubtaskFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) successes.push(outcome.result);
      else failures.push(outcome.failure);
    }

    const { merged, conflicts } = synthesize(successes);
    const [onlyKey] = merged.keys();
    const result = plan.single && merged.size === 1 ? merged.get(onlyKey) : Object.fromEntries(merged);

    const status: ResponseStatus =
      successes.length === 0 ? 'error' : failures.length > 0 || conflicts.length > 0 ? 'partial_success' : 'success';

    const agentsUsed = unique(successes.map((s) => s.agentId));
    const agentsFailed = unique(failures.flatMap((f) => (f.agentId ? [f.agentId] : [])));
    const responseText = successes.length > 0 ? toText(result) : failures[0].error.message;

    // (g) record the turn
    const sessionId = await this.recordTurn(request, role, context, responseText, successes.length > 0, logger);

    const metadata: ResponseMetadata = {
      status,
      role,
      sessionId,
      agentsUsed,
      agentsFailed,
      failedSubtasks: failures,
      conflicts,
      tokensUsed: context.estimatedTokens + estimateTokens(responseText),
    };
    const durationMs = this.now() - startedAt;

    if (successes.length === 0) {
      return failedResponse(request.requestId, failures[0].error, durationMs, metadata);
    }
    return {
      success: true,
      requestId: request.requestId,
      agentId: agentsUsed.length === 1 ? agentsUsed[0] : ORCHESTRATOR_AGENT_ID,
      result,
      durationMs,
      metadata,
    };
  }

  private async loadRawContext(request: AgentRequest, logger: Logger): Promise<RawContext> {
    try {
      return await this.contextSource(request);
    } catch (error) {
      logger.warn('Context source failed, continuing without context', { error: errorMessage(error) });
      return { resources: [] };
    }
  }

  /**
   * Start a subtask once; later callers share its outcome.
   */
  private runSubtask(subtaskId: string, run: RequestRun): Promise<SubtaskOutcome> {
    const existing = run.outcomes.get(subtaskId);
    if (existing) return existing;

    const outcome = this.executeSubtask(subtaskId, run);
    run.outcomes.set(subtaskId, outcome);
    return outcome;
  }

  private async executeSubtask(subtaskId: string, run: RequestRun): Promise<SubtaskOutcome> {
    const subtask = run.subtasks.get(subtaskId);
    if (!subtask) {
      throw new ValidationError(`Unknown subtask "${subtaskId}"`, { field: 'subtasks' });
    }

    const dependencies = await Promise.all(subtask.dependsOn.map((id) => this.runSubtask(id, run)));
    const failed = subtask.dependsOn.filter((_, index) => !dependencies[index].ok);
    if (failed.length > 0) {
      return failure(subtask, new DependencyFailedError(subtask.id, failed));
    }

    const dependencyResults: Record<string, unknown> = {};
    dependencies.forEach((outcome) => {
      if (outcome.ok) dependencyResults[outcome.result.subtaskId] = outcome.result.result;
    });

    try {
      return await this.pool.run(() => this.invoke(subtask, dependencyResults, run), {
        priority: run.request.priority ?? 0,
        signal: run.signal,
      });
    } catch (error) {
      // Only reached when cancelled while queued
      return failure(subtask, error);
    }
  }

  /**
   * Route and execute one subtask. AgentUnavailable from the chosen agent
   * is retried once on an alternate; nothing else is retried.
   */
  private async invoke(
    subtask: PlannedSubtask,
    dependencyResults: Record<string, unknown>,
    run: RequestRun
  ): Promise<SubtaskOutcome> {
    const { request } = run;
    const timeoutMs = subtask.timeoutMs ?? this.subtaskTimeoutMs;
    let unavailable: { error: AgentUnavailableError; agentId: Id } | undefined;

    for (let attempt = 1; attempt <= 2; attempt++) {
      if (run.signal.aborted) {
        return failure(subtask, run.signal.reason);
      }

      let reservation: Reservation;
      try {
        reservation = this.router.reserve({
          action: subtask.action,
          agentType: subtask.agentType,
          callerPermission: callerPermission(request.userContext.permissionLevel),
          exclude: unavailable ? [unavailable.agentId] : [],
        });
      } catch (error) {
        // No alternate: report why the first agent was unavailable
        if (unavailable) return failure(subtask, unavailable.error, unavailable.agentId);
        return failure(subtask, error);
      }

      const { agent } = reservation;
      const { agentId } = agent.descriptor;
      const logger = withLogContext(run.logger, { subtaskId: subtask.id, agentId });
      const invokedAt = this.now();

      try {
        const result = await withTimeout(
          (signal) =>
            agent.execute(subtask.action, subtask.params, {
              requestId: request.requestId,
              subtaskId: subtask.id,
              userContext: request.userContext,
              signal,
              logger,
              context: run.context,
              memory: run.memory,
              dependencyResults,
            }),
          {
            timeoutMs,
            onTimeout: () => new AgentTimeoutError(agentId, subtask.action, timeoutMs),
            signal: run.signal,
          }
        );
        this.metrics.recordInvocation(agentId, 'success', this.now() - invokedAt);
        // Free the slot before review; reviewers take their own
        reservation.release();

        const reviewConflict = await this.review(agent, subtask.action, result, logger);
        return {
          ok: true,
          result: {
            subtaskId: subtask.id,
            resultKey: subtask.resultKey,
            agentId,
            agentPermission: agent.descriptor.permissionLevel,
            result,
            reviewConflict,
          },
        };
      } catch (raw) {
        const error =
          raw instanceof RuntimeError ? raw : new InternalAgentError(agentId, subtask.action, errorMessage(raw), raw);
        this.metrics.recordInvocation(
          agentId,
          error instanceof AgentTimeoutError ? 'timeout' : 'failure',
          this.now() - invokedAt
        );
        logger.warn(`Subtask ${subtask.id} failed`, { attempt, error: error.message });

        if (error instanceof AgentUnavailableError && attempt === 1) {
          unavailable = { error, agentId };
          continue;
        }
        return failure(subtask, error, agentId);
      } finally {
        reservation.release();
      }
    }

    // Both attempts ended in AgentUnavailable
    return failure(subtask, unavailable?.error, unavailable?.agentId);
  }

  /**
   * Peer review when the agent asks for it.
   * @returns the review summary when the result was not approved
   */
  private async review(
    agent: AgentRuntime,
    action: string,
    result: unknown,
    logger: Logger
  ): Promise<string | undefined> {
    if (!agent.wantsPeerReview?.(action)) return undefined;

    if (!this.collaboration) {
      logger.warn(`Peer review requested for ${action} but no collaboration manager is configured`);
      return 'no collaboration manager configured';
    }

    try {
      const task = await this.collaboration.initiatePeerReview(agent.descriptor.agentId, result);
      if (task.status === 'resolved') return undefined;
      return task.resolution?.summary ?? task.status;
    } catch (error) {
      logger.error('Peer review failed', { error: errorMessage(error) });
      return `peer review failed: ${errorMessage(error)}`;
    }
  }

  private async recordTurn(
    request: AgentRequest,
    role: string,
    context: OptimizedContext,
    response: string,
    success: boolean,
    logger: Logger
  ): Promise<Id | undefined> {
    try {
      const turn = await this.memory.addTurn(request.userContext.userId, {
        query: getRequestQuery(request),
        response,
        contextSnapshot: {
          resourceIds: context.resources.map((r) => r.id),
          estimatedTokens: context.estimatedTokens,
        },
        tokensUsed: context.estimatedTokens + estimateTokens(response),
        role,
        success,
      });
      return turn.sessionId;
    } catch (error) {
      logger.warn('Failed to record conversation turn', { error: errorMessage(error) });
      return undefined;
    }
  }
}

function failure(subtask: PlannedSubtask, error: unknown, agentId?: Id): SubtaskOutcome {
  const entry: SubtaskFailure = {
    subtaskId: subtask.id,
    action: subtask.action,
    error: toAgentErrorInfo(
      error ?? new InternalAgentError(agentId ?? ORCHESTRATOR_AGENT_ID, subtask.action, 'no result')
    ),
  };
  if (agentId) entry.agentId = agentId;
  return { ok: false, failure: entry };
}

function failedResponse(
  requestId: Id,
  error: AgentErrorInfo,
  durationMs: number,
  metadata: ResponseMetadata
): AgentResponse {
  return {
    success: false,
    requestId,
    agentId: ORCHESTRATOR_AGENT_ID,
    error,
    durationMs,
    metadata: { ...metadata, status: 'error' },
  };
}

function emptyMetadata(): ResponseMetadata {
  return {
    status: 'error',
    agentsUsed: [],
    agentsFailed: [],
    failedSubtasks: [],
    conflicts: [],
    tokensUsed: 0,
  };
}

function unique<T>(values: T[]): T[] {
  return Array.from(new Set(values));
}

/**
 * Text form of a result, as stored in conversation memory
 */
function toText(result: unknown): string {
  if (typeof result === 'string') return result;
  try {
    return JSON.stringify(result) ?? '';
  } catch {
    // Circular structures and bigints
    return String(result);
  }
}
