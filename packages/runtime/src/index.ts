// @huddle/runtime
// Agent registry, routing and the request orchestrator

// Bootstrap (config → registry → orchestrator)
export { createHuddle, type Huddle, type HuddleOptions } from './bootstrap.js';

// Configuration
export {
  loadConfig,
  loadConfigFromEnv,
  huddleConfigSchema,
  sportsDataConfigSchema,
  DEFAULT_GLOBAL_TOKEN_BUDGET,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_MAX_TURNS_PER_USER,
  DEFAULT_RECENT_TURNS_IN_CONTEXT,
  DEFAULT_SESSION_IDLE_TIMEOUT_MS,
  DEFAULT_SESSION_SWEEP_INTERVAL_MS,
  DEFAULT_MAX_WORKERS,
  DEFAULT_SUBTASK_TIMEOUT_MS,
  DEFAULT_REVIEWERS_PER_TASK,
  DEFAULT_REVIEW_TIMEOUT_MS,
  DEFAULT_SPORTS_DATA_BASE_URL,
  type HuddleConfig,
  type HuddleConfigInput,
  type SportsDataConfig,
} from './config.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  PermissionDeniedError,
  CapabilityMismatchError,
  AgentUnavailableError,
  AgentTimeoutError,
  InternalAgentError,
  CancelledError,
  DependencyFailedError,
  DuplicateAgentTypeError,
  RegistryFrozenError,
  InvalidTaskTransitionError,
  ConfigError,
  SportsDataError,
  RateLimitedError,
  UnauthorizedError,
  NotFoundError,
  UpstreamError,
  errorMessage,
  errorKindOf,
  toAgentErrorInfo,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  withLogContext,
  createCapturingLogger,
  type Logger,
  type LogEntry,
} from './logger.js';

// Agents (contract, base class, built-ins)
export * from './agents/index.js';

// Permissions
export * from './access/index.js';

// Registry and routing
export * from './registry/index.js';
export * from './router/index.js';

// Context budgeting
export * from './context/index.js';

// Conversation memory
export * from './memory/index.js';

// Knowledge and peer review
export * from './collaboration/index.js';

// Orchestrator
export * from './orchestrator/index.js';

// External services
export * from './external/index.js';

// Concurrency helpers
export * from './concurrency/index.js';
