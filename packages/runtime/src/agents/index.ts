export {
  BaseAgent,
  DEFAULT_MAX_CONCURRENCY,
  stringParam,
  numberParam,
  type AgentCapabilitySpec,
  type BaseAgentInit,
  type CapabilityHandler,
} from './base-agent.js';
export type {
  AgentDefinition,
  AgentExecutionContext,
  AgentFactory,
  AgentFactoryOptions,
  AgentRuntime,
  ReviewContext,
  ReviewDecision,
} from './types.js';
export * from './builtin/index.js';
