// Agent contract types

import type {
  AgentDescriptor,
  Id,
  MemoryEnhancement,
  OptimizedContext,
  Params,
  ReviewVerdict,
  UserContext,
} from '@huddle/protocol';
import type { Logger } from '../logger.js';

/**
 * Everything an agent sees while executing one capability.
 */
export type AgentExecutionContext = {
  requestId: Id;

  /** Subtask within the request */
  subtaskId: string;

  userContext: UserContext;

  /**
   * Fired on cancellation or timeout. Agents should stop work promptly;
   * one that ignores it is abandoned at the timeout regardless.
   */
  signal: AbortSignal;

  logger: Logger;

  /** Budgeted context for the caller's role */
  context?: OptimizedContext;

  /** Continuity from conversation memory */
  memory?: MemoryEnhancement;

  /** Results of the subtasks this one depends on, by subtask id */
  dependencyResults: Record<string, unknown>;
};

/**
 * Context handed to a reviewer
 */
export type ReviewContext = {
  taskId: Id;
  initiatorAgentId: Id;
  signal: AbortSignal;
  logger: Logger;
};

/**
 * A reviewer's answer
 */
export type ReviewDecision = {
  verdict: ReviewVerdict;
  comments?: string;
};

/**
 * The contract every agent implements.
 * Dispatch is through this interface; the registry never inspects methods.
 */
export interface AgentRuntime {
  /** Frozen once the registry has created the agent */
  readonly descriptor: AgentDescriptor;

  /**
   * Run one capability. Throws runtime errors for expected failures;
   * anything else is reported as an internal agent error.
   */
  execute(action: string, params: Params, ctx: AgentExecutionContext): Promise<unknown>;

  /**
   * Review another agent's result. Agents without it are never picked as reviewers.
   */
  review?(payload: unknown, ctx: ReviewContext): Promise<ReviewDecision>;

  /**
   * Whether results of `action` must pass peer review before being accepted
   */
  wantsPeerReview?(action: string): boolean;
}

/**
 * Options passed to an agent factory
 */
export type AgentFactoryOptions = {
  agentId: Id;
  logger: Logger;
};

/**
 * Builds an agent instance. May be async when the agent loads external
 * resources; a rejection surfaces as AgentUnavailable.
 */
export type AgentFactory = (options: AgentFactoryOptions) => AgentRuntime | Promise<AgentRuntime>;

/**
 * A registry entry
 */
export type AgentDefinition = {
  factory: AgentFactory;
  description?: string;
};
