// Request and response types for the orchestrator contract

import type { Id, Params } from './common.js';
import type { PermissionLevel } from './permissions.js';

/**
 * Agent type used when the caller wants the router to choose
 */
export const UNSPECIFIED_AGENT_TYPE = 'unspecified';

/**
 * Action used when the caller wants the planner to decompose the query
 */
export const AUTO_ACTION = 'auto';

/**
 * Caller identity and hints.
 */
export type UserContext = {
  /** Required caller id */
  userId: Id;

  /** Optional role hint (analyst, data_scientist, production, ...) */
  role?: string;

  /** Level held by the caller; read_only when absent */
  permissionLevel?: PermissionLevel;

  /** Extra caller-supplied hints */
  [key: string]: unknown;
};

/**
 * One unit of work inside a request.
 */
export type SubtaskSpec = {
  /** Unique within the request */
  id: string;

  /** Preferred agent type; the router still enforces the gates */
  agentType?: string;

  /** Capability to invoke */
  action: string;

  params?: Params;

  /** Subtask ids whose results this subtask needs */
  dependsOn?: string[];

  /** Results sharing a key are merged during synthesis */
  resultKey?: string;

  /** Overrides the orchestrator's per-invocation timeout */
  timeoutMs?: number;
};

/**
 * A request submitted to the orchestrator.
 */
export type AgentRequest = {
  requestId: Id;

  /** Target agent type, or 'unspecified' */
  agentType: string;

  /** Action name, or 'auto' */
  action: string;

  /** Parameters; the query text lives at params.query */
  params: Params;

  userContext: UserContext;

  /** Epoch milliseconds, increasing per orchestrator */
  timestamp: number;

  /** Higher is more urgent */
  priority?: number;

  /** Explicit decomposition */
  subtasks?: SubtaskSpec[];
};

/**
 * Error kinds surfaced to callers
 */
export type AgentErrorKind =
  | 'permission_denied'
  | 'capability_mismatch'
  | 'agent_unavailable'
  | 'timeout'
  | 'validation_error'
  | 'internal_agent_error'
  | 'cancelled'
  | 'dependency_failed';

/**
 * Structured, human-readable error description
 */
export type AgentErrorInfo = {
  kind: AgentErrorKind;
  message: string;
};

/**
 * A subtask that did not produce a result
 */
export type SubtaskFailure = {
  subtaskId: string;
  action: string;
  agentId?: Id;
  error: AgentErrorInfo;
};

/**
 * Two results for the same key that synthesis could not reconcile
 */
export type ResultConflict = {
  resultKey: string;
  candidates: Array<{
    subtaskId: string;
    agentId: Id;
    result: unknown;
    confidence?: number;
  }>;
  reason: string;
};

export type ResponseStatus = 'success' | 'partial_success' | 'error';

/**
 * Metadata attached to every response
 */
export type ResponseMetadata = {
  status: ResponseStatus;
  role?: string;
  sessionId?: Id;
  agentsUsed: Id[];
  agentsFailed: Id[];
  failedSubtasks: SubtaskFailure[];
  conflicts: ResultConflict[];
  tokensUsed: number;
};

type ResponseBase = {
  requestId: Id;
  /** Originating agent id, or 'orchestrator' for multi-agent or early failures */
  agentId: Id;
  durationMs: number;
  metadata: ResponseMetadata;
};

/**
 * Response from the orchestrator. Exactly one of result/error is present.
 */
export type AgentResponse =
  | (ResponseBase & { success: true; result: unknown; error?: never })
  | (ResponseBase & { success: false; error: AgentErrorInfo; result?: never });
