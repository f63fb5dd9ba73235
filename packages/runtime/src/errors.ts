// Runtime error types

import type { AgentErrorInfo, AgentErrorKind, PermissionLevel } from '@huddle/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * The caller (or the agent) holds a level below the capability's requirement.
 * Never retried.
 */
export class PermissionDeniedError extends RuntimeError {
  readonly action: string;
  readonly held: PermissionLevel | undefined;
  readonly required: PermissionLevel;

  constructor(action: string, held: PermissionLevel | undefined, required: PermissionLevel, subject = 'caller') {
    super(
      'PERMISSION_DENIED',
      `Permission denied for "${action}": ${subject} holds ${held ?? 'no valid level'}, requires ${required}`
    );
    this.name = 'PermissionDeniedError';
    this.action = action;
    this.held = held;
    this.required = required;
  }
}

/**
 * No agent exposes the requested action. Never retried.
 */
export class CapabilityMismatchError extends RuntimeError {
  readonly action: string;
  readonly agentType?: string;

  constructor(action: string, agentType?: string) {
    super(
      'CAPABILITY_MISMATCH',
      agentType
        ? `Agent type "${agentType}" does not expose capability "${action}"`
        : `No agent exposes capability "${action}"`
    );
    this.name = 'CapabilityMismatchError';
    this.action = action;
    this.agentType = agentType;
  }
}

/**
 * Construction failure, missing dependency, or saturation.
 * Retried once against an alternate candidate.
 */
export class AgentUnavailableError extends RuntimeError {
  readonly target: string;
  readonly reason: string;

  constructor(target: string, reason: string, cause?: unknown) {
    super('AGENT_UNAVAILABLE', `Agent unavailable (${target}): ${reason}`, { cause });
    this.name = 'AgentUnavailableError';
    this.target = target;
    this.reason = reason;
  }
}

/**
 * An agent invocation exceeded its time budget.
 */
export class AgentTimeoutError extends RuntimeError {
  readonly agentId: string;
  readonly action: string;
  readonly timeoutMs: number;

  constructor(agentId: string, action: string, timeoutMs: number) {
    super('TIMEOUT', `Agent ${agentId} timed out after ${timeoutMs}ms running "${action}"`);
    this.name = 'AgentTimeoutError';
    this.agentId = agentId;
    this.action = action;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Unexpected exception raised inside an agent.
 */
export class InternalAgentError extends RuntimeError {
  readonly agentId: string;
  readonly action: string;

  constructor(agentId: string, action: string, message: string, cause?: unknown) {
    super('INTERNAL_AGENT_ERROR', `Agent ${agentId} failed running "${action}": ${message}`, { cause });
    this.name = 'InternalAgentError';
    this.agentId = agentId;
    this.action = action;
  }
}

/**
 * The request was cancelled while the subtask was pending or running.
 */
export class CancelledError extends RuntimeError {
  readonly requestId: string;

  constructor(requestId: string, detail?: string) {
    super('CANCELLED', `Request ${requestId} was cancelled${detail ? `: ${detail}` : ''}`);
    this.name = 'CancelledError';
    this.requestId = requestId;
  }
}

/**
 * A subtask could not run because a dependency failed.
 */
export class DependencyFailedError extends RuntimeError {
  readonly subtaskId: string;
  readonly dependencyIds: string[];

  constructor(subtaskId: string, dependencyIds: string[]) {
    super(
      'DEPENDENCY_FAILED',
      `Subtask "${subtaskId}" skipped: dependency ${dependencyIds.map((d) => `"${d}"`).join(', ')} failed`
    );
    this.name = 'DependencyFailedError';
    this.subtaskId = subtaskId;
    this.dependencyIds = dependencyIds;
  }
}

/**
 * An agent type was registered twice.
 */
export class DuplicateAgentTypeError extends RuntimeError {
  readonly agentType: string;

  constructor(agentType: string) {
    super('DUPLICATE_AGENT_TYPE', `Agent type already registered: ${agentType}`);
    this.name = 'DuplicateAgentTypeError';
    this.agentType = agentType;
  }
}

/**
 * Registration attempted after the registry was frozen.
 */
export class RegistryFrozenError extends RuntimeError {
  constructor(operation: string) {
    super('REGISTRY_FROZEN', `Cannot ${operation}: capability registry is frozen`);
    this.name = 'RegistryFrozenError';
  }
}

/**
 * Illegal collaboration task status change.
 */
export class InvalidTaskTransitionError extends RuntimeError {
  readonly taskId: string;
  readonly from: string;
  readonly to: string;

  constructor(taskId: string, from: string, to: string) {
    super('INVALID_TASK_TRANSITION', `Cannot move collaboration task ${taskId} from "${from}" to "${to}"`);
    this.name = 'InvalidTaskTransitionError';
    this.taskId = taskId;
    this.from = from;
    this.to = to;
  }
}

/**
 * Invalid configuration.
 */
export class ConfigError extends RuntimeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Failure talking to the sports-data API.
 */
export class SportsDataError extends RuntimeError {
  readonly status?: number;

  constructor(code: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(code, message, { cause: options?.cause });
    this.name = 'SportsDataError';
    this.status = options?.status;
  }
}

/**
 * HTTP 429. Never retried by the client; callers may wait `retryAfterMs`.
 */
export class RateLimitedError extends SportsDataError {
  readonly retryAfterMs?: number;

  constructor(path: string, retryAfterMs?: number) {
    super(
      'RATE_LIMITED',
      `Sports data API rate limited ${path}${retryAfterMs !== undefined ? `, retry after ${retryAfterMs}ms` : ''}`,
      { status: 429 }
    );
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * HTTP 401 or 403: missing or rejected API key.
 */
export class UnauthorizedError extends SportsDataError {
  constructor(path: string, status: number) {
    super('UNAUTHORIZED', `Sports data API refused ${path} (HTTP ${status}); check the API key`, { status });
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends SportsDataError {
  constructor(path: string) {
    super('NOT_FOUND', `Sports data API has no resource at ${path}`, { status: 404 });
    this.name = 'NotFoundError';
  }
}

/**
 * Server errors that persisted through every retry.
 */
export class UpstreamError extends SportsDataError {
  readonly attempts: number;

  constructor(path: string, status: number | undefined, attempts: number, cause?: unknown) {
    super(
      'UPSTREAM_ERROR',
      `Sports data API failed for ${path} after ${attempts} attempt(s)${status ? ` (HTTP ${status})` : ''}`,
      { status, cause }
    );
    this.name = 'UpstreamError';
    this.attempts = attempts;
  }
}

/**
 * Extract a message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify a thrown value as a caller-facing error kind.
 * Anything not raised deliberately by the runtime is an internal agent error.
 */
export function errorKindOf(error: unknown): AgentErrorKind {
  if (error instanceof PermissionDeniedError) return 'permission_denied';
  if (error instanceof CapabilityMismatchError) return 'capability_mismatch';
  if (error instanceof AgentUnavailableError) return 'agent_unavailable';
  if (error instanceof AgentTimeoutError) return 'timeout';
  if (error instanceof ValidationError) return 'validation_error';
  if (error instanceof CancelledError) return 'cancelled';
  if (error instanceof DependencyFailedError) return 'dependency_failed';
  return 'internal_agent_error';
}

/**
 * Convert any thrown value into response data
 */
export function toAgentErrorInfo(error: unknown): AgentErrorInfo {
  return { kind: errorKindOf(error), message: errorMessage(error) };
}
