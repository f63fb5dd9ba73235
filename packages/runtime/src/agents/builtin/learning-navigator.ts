// Learning navigator - recommends notebooks and explains concepts

import type { ExpertiseLevel, Params } from '@huddle/protocol';
import { BaseAgent, stringParam } from '../base-agent.js';
import type { AgentDefinition, AgentExecutionContext } from '../types.js';
import { ValidationError } from '../../errors.js';
import {
  loadLearningCatalog,
  type ConceptExplanation,
  type LearningCatalog,
  type LearningItem,
} from './learning-catalog.js';

export const LEARNING_NAVIGATOR_TYPE = 'learning_navigator';

const DEFAULT_ROLE = 'analyst';
const MAX_RECOMMENDATIONS = 3;

const DIFFICULTY_FOR_LEVEL: Record<ExpertiseLevel, LearningItem['difficulty'][]> = {
  beginner: ['beginner', 'intermediate'],
  intermediate: ['intermediate', 'advanced', 'beginner'],
  advanced: ['advanced', 'intermediate', 'beginner'],
};

/**
 * Handlers close over the catalogue, not the agent, since they are built
 * before `super` runs.
 */
export class LearningNavigatorAgent extends BaseAgent {
  constructor(agentId: string, catalog: LearningCatalog) {
    super({
      agentType: LEARNING_NAVIGATOR_TYPE,
      agentId,
      name: 'Learning Navigator',
      permissionLevel: 'read_execute_write',
      expertiseDomains: ['learning', 'education'],
      capabilities: [
        {
          name: 'recommend_content',
          description: 'Suggest the next notebooks for the caller',
          requiredPermission: 'read_only',
          executionTimeEstimateMs: 500,
          dataAccess: ['notebooks'],
          domainTags: ['learning'],
          handler: async (params, ctx) => recommendContent(catalog, params, ctx),
        },
        {
          name: 'guide_learning_path',
          description: 'Show progress along the role learning path',
          requiredPermission: 'read_only',
          executionTimeEstimateMs: 1000,
          dataAccess: ['notebooks'],
          domainTags: ['learning'],
          handler: async (params, ctx) => guideLearningPath(catalog, params, ctx),
        },
        {
          name: 'explain_concept',
          description: 'Explain an analytics concept at the caller level',
          requiredPermission: 'read_only',
          executionTimeEstimateMs: 500,
          domainTags: ['learning'],
          handler: async (params, ctx) => explainConcept(catalog, params, ctx),
        },
      ],
    });
  }
}

function recommendContent(catalog: LearningCatalog, params: Params, ctx: AgentExecutionContext) {
  const role = roleFor(ctx);
  const path = pathFor(catalog, role);
  const completed = completedIds(params);
  const level = ctx.memory?.preferences.expertiseLevel ?? 'beginner';
  const query = stringParam(params, 'query').toLowerCase();

  const remaining = path.filter((item) => !completed.has(item.id));
  const ranked = remaining
    .map((item, position) => ({ item, position, score: relevance(item, query, level) }))
    .sort((a, b) => b.score - a.score || a.position - b.position)
    .slice(0, MAX_RECOMMENDATIONS)
    .map(({ item }) => item);

  return {
    role,
    expertiseLevel: level,
    recommendations: ranked.map((item) => ({
      id: item.id,
      title: item.title,
      description: item.description,
      difficulty: item.difficulty,
      estimatedMinutes: item.estimatedMinutes,
    })),
    pathComplete: remaining.length === 0,
    confidence: 0.8,
  };
}

function guideLearningPath(catalog: LearningCatalog, params: Params, ctx: AgentExecutionContext) {
  const role = roleFor(ctx);
  const path = pathFor(catalog, role);
  const completed = completedIds(params);
  const nextIndex = path.findIndex((item) => !completed.has(item.id));
  const done = path.filter((item) => completed.has(item.id)).length;

  return {
    role,
    steps: path.map((item, index) => ({
      id: item.id,
      title: item.title,
      status: completed.has(item.id) ? 'completed' : index === nextIndex ? 'next' : 'upcoming',
    })),
    progress: {
      completed: done,
      total: path.length,
      percent: path.length === 0 ? 0 : Math.round((done / path.length) * 100),
    },
    advice: adviceFor(done, path.length),
    confidence: 0.85,
  };
}

function explainConcept(catalog: LearningCatalog, params: Params, ctx: AgentExecutionContext) {
  const concept = stringParam(params, 'concept').trim() || stringParam(params, 'query').trim();
  if (!concept) {
    throw new ValidationError('explain_concept needs a "concept" parameter', { field: 'concept' });
  }

  const level = ctx.memory?.preferences.expertiseLevel ?? 'beginner';
  const explanation = findConcept(catalog, concept);
  if (!explanation) {
    return {
      concept,
      known: false,
      explanation: `No stored explanation for "${concept}"`,
      related: Object.keys(catalog.concepts),
      confidence: 0.3,
    };
  }

  return {
    concept: explanation.title,
    known: true,
    level,
    explanation: level === 'beginner' ? explanation.simple : explanation.detailed,
    example: explanation.example,
    confidence: 0.9,
  };
}

function findConcept(catalog: LearningCatalog, text: string): ConceptExplanation | undefined {
  const lower = text.toLowerCase();
  const exact = catalog.concepts[lower];
  if (exact) return exact;
  const key = Object.keys(catalog.concepts).find((name) => lower.includes(name));
  return key ? catalog.concepts[key] : undefined;
}

function roleFor(ctx: AgentExecutionContext): string {
  return ctx.context?.role ?? ctx.userContext.role ?? DEFAULT_ROLE;
}

function pathFor(catalog: LearningCatalog, role: string): LearningItem[] {
  return catalog.paths[role] ?? catalog.paths[DEFAULT_ROLE] ?? Object.values(catalog.paths)[0] ?? [];
}

function completedIds(params: Params): Set<string> {
  const value = params.completed;
  return new Set(Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : []);
}

/**
 * Concept words from the query count most, then fit to the user's level
 */
function relevance(item: LearningItem, query: string, level: ExpertiseLevel): number {
  const mentioned = (concept: string) =>
    concept.split(' ').some((word) => word.length > 3 && query.includes(word));
  const conceptHits = query ? item.concepts.filter(mentioned).length : 0;
  const preference = DIFFICULTY_FOR_LEVEL[level].indexOf(item.difficulty);
  const levelScore = preference === -1 ? 0 : DIFFICULTY_FOR_LEVEL[level].length - preference;
  return conceptHits * 10 + levelScore;
}

function adviceFor(done: number, total: number): string {
  if (done === 0) return 'Start with the first notebook to learn how the data is laid out';
  if (done >= total) return 'Path complete. Try the next role path for more depth';
  if (done < total / 3) return 'Get comfortable with the basics before moving to the advanced notebooks';
  if (done < (2 * total) / 3) return 'Good progress. Try the techniques on questions of your own';
  return 'Advanced material ahead. The modeling notebooks are a natural next step';
}

export function createLearningNavigatorDefinition(
  options: { catalog?: LearningCatalog; catalogPath?: string } = {}
): AgentDefinition {
  return {
    description: 'Learning paths, notebook recommendations and concept explanations',
    factory: async ({ agentId }) =>
      new LearningNavigatorAgent(agentId, options.catalog ?? (await loadLearningCatalog(options.catalogPath))),
  };
}
