// Insight generator - trend analysis and narrative insights
//
// generate_insights results go through peer review before the
// orchestrator accepts them.

import type { Params } from '@huddle/protocol';
import { BaseAgent, stringParam } from '../base-agent.js';
import type { AgentDefinition, AgentExecutionContext } from '../types.js';
import { ValidationError } from '../../errors.js';

export const INSIGHT_GENERATOR_TYPE = 'insight_generator';

const REVIEWED_ACTIONS = new Set(['generate_insights']);

export type TrendDirection = 'up' | 'down' | 'flat';

export class InsightGeneratorAgent extends BaseAgent {
  constructor(agentId: string) {
    super({
      agentType: INSIGHT_GENERATOR_TYPE,
      agentId,
      name: 'Insight Generator',
      permissionLevel: 'read_execute',
      expertiseDomains: ['analytics', 'trends'],
      capabilities: [
        {
          name: 'analyze_trends',
          description: 'Fit a trend line to a metric series',
          requiredPermission: 'read_execute',
          executionTimeEstimateMs: 1500,
          dataAccess: ['team_stats'],
          domainTags: ['analytics', 'trends'],
          handler: async (params) => analyzeTrends(params),
        },
        {
          name: 'generate_insights',
          description: 'Summarize metrics and upstream results as insights',
          requiredPermission: 'read_execute',
          executionTimeEstimateMs: 3000,
          dataAccess: ['team_stats', 'predictions'],
          domainTags: ['analytics', 'insights'],
          handler: async (params, ctx) => generateInsights(params, ctx),
        },
      ],
    });
  }

  wantsPeerReview(action: string): boolean {
    return REVIEWED_ACTIONS.has(action);
  }
}

export function analyzeTrends(params: Params) {
  const series = params.series;
  if (!Array.isArray(series) || series.length < 2 || !series.every(isFiniteNumber)) {
    throw new ValidationError('analyze_trends needs "series": at least two numbers', { field: 'series' });
  }

  const n = series.length;
  const meanX = (n - 1) / 2;
  const meanY = series.reduce((sum, y) => sum + y, 0) / n;
  let covariance = 0;
  let varianceX = 0;
  series.forEach((y, x) => {
    covariance += (x - meanX) * (y - meanY);
    varianceX += (x - meanX) ** 2;
  });
  const slope = covariance / varianceX;

  const first = series[0];
  const last = series[n - 1];
  const flatBand = Math.abs(meanY) * 0.01;
  const direction: TrendDirection = Math.abs(slope) <= flatBand ? 'flat' : slope > 0 ? 'up' : 'down';

  return {
    metric: stringParam(params, 'metric', 'value'),
    points: n,
    mean: meanY,
    slope,
    change: last - first,
    percentChange: first === 0 ? null : ((last - first) / Math.abs(first)) * 100,
    direction,
    confidence: Math.min(0.95, 0.5 + n * 0.05),
  };
}

export function generateInsights(params: Params, ctx: AgentExecutionContext) {
  const metrics = collectMetrics(params.metrics);
  const insights: string[] = [];

  const ranked = Object.entries(metrics).sort(([, a], [, b]) => b - a);
  if (ranked.length > 0) {
    const [topName, topValue] = ranked[0];
    insights.push(`${topName} leads at ${round(topValue)}`);
  }
  if (ranked.length > 1) {
    const [lowName, lowValue] = ranked[ranked.length - 1];
    insights.push(`${lowName} trails at ${round(lowValue)}`);
  }

  for (const [subtaskId, result] of Object.entries(ctx.dependencyResults)) {
    const probability = predictionProbability(result);
    if (probability !== undefined) {
      insights.push(`Model from ${subtaskId} gives the home side a ${Math.round(probability * 100)}% chance`);
    }
  }

  const lastTopic = ctx.memory?.continuity.lastTopic;
  if (lastTopic && lastTopic !== 'general') {
    insights.push(`Builds on the earlier ${lastTopic.replace('_', ' ')} discussion`);
  }

  const evidence = ranked.length + Object.keys(ctx.dependencyResults).length;
  if (evidence === 0) {
    return {
      query: stringParam(params, 'query'),
      insights: ['Not enough data to draw an insight'],
      confidence: 0.3,
    };
  }

  return {
    query: stringParam(params, 'query'),
    insights,
    confidence: Math.min(0.9, 0.4 + evidence * 0.1),
  };
}

function collectMetrics(value: unknown): Record<string, number> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  const metrics: Record<string, number> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isFiniteNumber(entry)) metrics[key] = entry;
  }
  return metrics;
}

function predictionProbability(result: unknown): number | undefined {
  if (typeof result !== 'object' || result === null) return undefined;
  const prediction: unknown = Reflect.get(result, 'prediction');
  if (typeof prediction !== 'object' || prediction === null) return undefined;
  const probability: unknown = Reflect.get(prediction, 'probability');
  return isFiniteNumber(probability) ? probability : undefined;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

export function createInsightGeneratorDefinition(): AgentDefinition {
  return {
    description: 'Trend analysis and insights, peer reviewed',
    factory: ({ agentId }) => new InsightGeneratorAgent(agentId),
  };
}
