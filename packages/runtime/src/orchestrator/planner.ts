// Planner - turns a request into subtasks
//
// Explicit subtasks are used as given. A concrete action becomes a single
// subtask. The 'auto' action is decomposed by keywords in the query.

import {
  AUTO_ACTION,
  UNSPECIFIED_AGENT_TYPE,
  getRequestQuery,
  type AgentRequest,
  type Params,
  type SubtaskSpec,
} from '@huddle/protocol';
import { ValidationError } from '../errors.js';

/**
 * A subtask with defaults filled in
 */
export type PlannedSubtask = {
  id: string;
  agentType?: string;
  action: string;
  params: Params;
  dependsOn: string[];
  resultKey: string;
  timeoutMs?: number;
};

export type Plan = {
  subtasks: PlannedSubtask[];

  /** The request named one action and nothing else */
  single: boolean;
};

type KeywordRule = {
  id: string;
  keywords: string[];
  agentType: string;
  action: string;
  dependsOn?: string[];
};

/** Checked in order; a later rule may depend on an earlier one */
const KEYWORD_RULES: KeywordRule[] = [
  {
    id: 'learning',
    keywords: ['learn', 'tutorial', 'explain', 'teach'],
    agentType: 'learning_navigator',
    action: 'recommend_content',
  },
  {
    id: 'prediction',
    keywords: ['predict', 'model', 'forecast'],
    agentType: 'model_engine',
    action: 'predict_game_outcome',
  },
  {
    id: 'insights',
    keywords: ['analyze', 'analyse', 'insight', 'trend'],
    agentType: 'insight_generator',
    action: 'generate_insights',
    dependsOn: ['prediction'],
  },
];

const FALLBACK_RULE = KEYWORD_RULES[0];

/**
 * Build and validate the plan for a request.
 *
 * @throws ValidationError for unknown or cyclic dependencies
 */
export function planRequest(request: AgentRequest): Plan {
  if (request.subtasks && request.subtasks.length > 0) {
    const subtasks = request.subtasks.map((spec) => fillDefaults(spec, request.params));
    validatePlan(subtasks);
    return { subtasks, single: false };
  }

  if (request.action !== AUTO_ACTION) {
    const agentType = request.agentType === UNSPECIFIED_AGENT_TYPE ? undefined : request.agentType;
    const subtask = fillDefaults({ id: 'main', agentType, action: request.action }, request.params);
    return { subtasks: [subtask], single: true };
  }

  const subtasks = planFromQuery(getRequestQuery(request)).map((spec) => fillDefaults(spec, request.params));
  validatePlan(subtasks);
  return { subtasks, single: subtasks.length === 1 };
}

/**
 * Keyword decomposition of a free-text query. Never empty.
 */
export function planFromQuery(query: string): SubtaskSpec[] {
  const text = query.toLowerCase();
  const matched = KEYWORD_RULES.filter((rule) => rule.keywords.some((k) => text.includes(k)));
  const rules = matched.length > 0 ? matched : [FALLBACK_RULE];
  const ids = new Set(rules.map((r) => r.id));

  return rules.map((rule) => ({
    id: rule.id,
    agentType: rule.agentType,
    action: rule.action,
    dependsOn: (rule.dependsOn ?? []).filter((d) => ids.has(d)),
  }));
}

function fillDefaults(spec: SubtaskSpec, requestParams: Params): PlannedSubtask {
  return {
    id: spec.id,
    agentType: spec.agentType,
    action: spec.action,
    params: spec.params ?? requestParams,
    dependsOn: spec.dependsOn ?? [],
    resultKey: spec.resultKey ?? spec.id,
    timeoutMs: spec.timeoutMs,
  };
}

/**
 * Check that dependencies name known subtasks and form no cycle.
 */
export function validatePlan(subtasks: PlannedSubtask[]): void {
  const byId = new Map<string, PlannedSubtask>();
  for (const subtask of subtasks) {
    if (byId.has(subtask.id)) {
      throw new ValidationError(`Duplicate subtask id: ${subtask.id}`, { field: 'subtasks' });
    }
    byId.set(subtask.id, subtask);
  }

  for (const subtask of subtasks) {
    for (const dependency of subtask.dependsOn) {
      if (!byId.has(dependency)) {
        throw new ValidationError(`Subtask "${subtask.id}" depends on unknown subtask "${dependency}"`, {
          field: 'subtasks',
        });
      }
    }
  }

  // Depth-first search; a grey node reached again closes a cycle
  const state = new Map<string, 'visiting' | 'done'>();
  const visit = (id: string, path: string[]): void => {
    const seen = state.get(id);
    if (seen === 'done') return;
    if (seen === 'visiting') {
      const cycle = [...path.slice(path.indexOf(id)), id];
      throw new ValidationError(`Subtask dependencies form a cycle: ${cycle.join(' -> ')}`, {
        field: 'subtasks',
        details: { cycle },
      });
    }
    state.set(id, 'visiting');
    for (const dependency of byId.get(id)?.dependsOn ?? []) {
      visit(dependency, [...path, id]);
    }
    state.set(id, 'done');
  };

  for (const subtask of subtasks) {
    visit(subtask.id, []);
  }
}
