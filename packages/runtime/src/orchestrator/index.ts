export {
  Orchestrator,
  ORCHESTRATOR_AGENT_ID,
  type OrchestratorOptions,
  type ContextSource,
} from './orchestrator.js';
export { planRequest, planFromQuery, validatePlan, type Plan, type PlannedSubtask } from './planner.js';
export { synthesize, confidenceOf, type SubtaskResult, type Synthesis } from './synthesis.js';
export {
  OrchestratorMetrics,
  type AgentMetrics,
  type GlobalMetrics,
  type InvocationOutcome,
  type MetricsSnapshot,
} from './metrics.js';
