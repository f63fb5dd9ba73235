// Tests for the insight generator

import { describe, it, expect } from 'vitest';
import type { MemoryEnhancement } from '@huddle/protocol';
import { createMockExecutionContext } from '../../testing/mock-agents.js';
import { ValidationError } from '../../errors.js';
import { InsightGeneratorAgent, analyzeTrends, generateInsights } from './insight-generator.js';

describe('analyzeTrends', () => {
  it('should fit a rising series', () => {
    const trend = analyzeTrends({ metric: 'epa', series: [1, 2, 3, 4] });

    expect(trend).toMatchObject({
      metric: 'epa',
      points: 4,
      mean: 2.5,
      slope: 1,
      change: 3,
      percentChange: 300,
      direction: 'up',
    });
    expect(trend.confidence).toBeCloseTo(0.7);
  });

  it('should call a constant series flat', () => {
    expect(analyzeTrends({ series: [10, 10, 10] })).toMatchObject({ metric: 'value', slope: 0, direction: 'flat' });
  });

  it('should report a falling series', () => {
    expect(analyzeTrends({ series: [9, 6, 3] })).toMatchObject({ slope: -3, direction: 'down', change: -6 });
  });

  it('should leave percent change out when the series starts at zero', () => {
    expect(analyzeTrends({ series: [0, 5] }).percentChange).toBeNull();
  });

  it('should cap confidence for long series', () => {
    expect(analyzeTrends({ series: Array.from({ length: 20 }, (_, i) => i) }).confidence).toBe(0.95);
  });

  it.each([[undefined], [[1]], [[1, 'two']], [[1, Number.NaN]]])('should reject series %j', (series) => {
    expect(() => analyzeTrends({ series })).toThrow(ValidationError);
  });
});

describe('generateInsights', () => {
  it('should combine metrics, predictions and continuity', () => {
    const memory: MemoryEnhancement = {
      userId: 'user-1',
      recentTurns: [],
      preferences: { expertiseLevel: 'beginner', preferredTopics: [] },
      continuity: { lastTopic: 'game_prediction', momentum: 2 },
      memoryAvailable: true,
    };
    const ctx = createMockExecutionContext({
      memory,
      dependencyResults: { prediction: { prediction: { value: 1, probability: 0.62 } } },
    });

    const result = generateInsights(
      { query: 'analyze Army', metrics: { epa: 0.25, success_rate: 0.48, explosiveness: 1.234, label: 'x' } },
      ctx
    );

    expect(result.query).toBe('analyze Army');
    expect(result.insights).toEqual([
      'explosiveness leads at 1.23',
      'epa trails at 0.25',
      'Model from prediction gives the home side a 62% chance',
      'Builds on the earlier game prediction discussion',
    ]);
    expect(result.confidence).toBeCloseTo(0.8);
  });

  it('should say so when there is nothing to work with', () => {
    expect(generateInsights({}, createMockExecutionContext())).toEqual({
      query: '',
      insights: ['Not enough data to draw an insight'],
      confidence: 0.3,
    });
  });
});

describe('InsightGeneratorAgent', () => {
  it('should ask for peer review of generated insights only', () => {
    const agent = new InsightGeneratorAgent('insight-1');

    expect(agent.wantsPeerReview('generate_insights')).toBe(true);
    expect(agent.wantsPeerReview('analyze_trends')).toBe(false);
  });
});
