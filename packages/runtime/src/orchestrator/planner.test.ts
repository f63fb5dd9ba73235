// Tests for request planning

import { describe, it, expect } from 'vitest';
import type { AgentRequest } from '@huddle/protocol';
import { ValidationError } from '../errors.js';
import { planFromQuery, planRequest, validatePlan, type PlannedSubtask } from './planner.js';

function createRequest(overrides: Partial<AgentRequest> = {}): AgentRequest {
  return {
    requestId: 'req-1',
    agentType: 'unspecified',
    action: 'auto',
    params: { query: 'what should I read next' },
    userContext: { userId: 'user-1' },
    timestamp: 1,
    ...overrides,
  };
}

function subtask(id: string, dependsOn: string[] = []): PlannedSubtask {
  return { id, action: 'noop', params: {}, dependsOn, resultKey: id };
}

describe('planFromQuery', () => {
  it('should fall back to content recommendation', () => {
    expect(planFromQuery('hello there')).toEqual([
      { id: 'learning', agentType: 'learning_navigator', action: 'recommend_content', dependsOn: [] },
    ]);
  });

  it('should make insights wait for a prediction in the same query', () => {
    expect(planFromQuery('Predict Saturday and analyze the trend')).toEqual([
      { id: 'prediction', agentType: 'model_engine', action: 'predict_game_outcome', dependsOn: [] },
      { id: 'insights', agentType: 'insight_generator', action: 'generate_insights', dependsOn: ['prediction'] },
    ]);
  });

  it('should drop dependencies on subtasks that were not planned', () => {
    expect(planFromQuery('show me the trend')).toEqual([
      { id: 'insights', agentType: 'insight_generator', action: 'generate_insights', dependsOn: [] },
    ]);
  });
});

describe('planRequest', () => {
  it('should turn a concrete action into one subtask', () => {
    const plan = planRequest(createRequest({ agentType: 'model_engine', action: 'list_models', params: { a: 1 } }));

    expect(plan).toEqual({
      single: true,
      subtasks: [
        {
          id: 'main',
          agentType: 'model_engine',
          action: 'list_models',
          params: { a: 1 },
          dependsOn: [],
          resultKey: 'main',
          timeoutMs: undefined,
        },
      ],
    });
  });

  it('should leave the agent type open for unspecified requests', () => {
    const plan = planRequest(createRequest({ action: 'list_models' }));
    expect(plan.subtasks[0].agentType).toBeUndefined();
  });

  it('should fill defaults on explicit subtasks', () => {
    const plan = planRequest(
      createRequest({
        params: { query: 'q' },
        subtasks: [
          { id: 'a', action: 'fetch_games', params: { season: 2024 } },
          { id: 'b', action: 'analyze_trends', dependsOn: ['a'], resultKey: 'trend', timeoutMs: 50 },
        ],
      })
    );

    expect(plan.single).toBe(false);
    expect(plan.subtasks[1]).toEqual({
      id: 'b',
      agentType: undefined,
      action: 'analyze_trends',
      params: { query: 'q' },
      dependsOn: ['a'],
      resultKey: 'trend',
      timeoutMs: 50,
    });
  });

  it('should reject an unknown dependency', () => {
    const request = createRequest({ subtasks: [{ id: 'a', action: 'x', dependsOn: ['missing'] }] });
    expect(() => planRequest(request)).toThrow('Subtask "a" depends on unknown subtask "missing"');
  });
});

describe('validatePlan', () => {
  it('should accept a diamond', () => {
    expect(() =>
      validatePlan([subtask('a'), subtask('b', ['a']), subtask('c', ['a']), subtask('d', ['b', 'c'])])
    ).not.toThrow();
  });

  it('should name the cycle', () => {
    expect(() => validatePlan([subtask('a', ['c']), subtask('b', ['a']), subtask('c', ['b'])])).toThrow(
      'Subtask dependencies form a cycle: a -> c -> b -> a'
    );
  });

  it('should reject a self dependency', () => {
    expect(() => validatePlan([subtask('a', ['a'])])).toThrow(ValidationError);
  });
});
