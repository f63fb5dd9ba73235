// Tests for the quality assurance agent

import { describe, it, expect } from 'vitest';
import { createMockExecutionContext } from '../../testing/mock-agents.js';
import { silentLogger } from '../../logger.js';
import type { ReviewContext } from '../types.js';
import { QualityAssuranceAgent, inspectResult } from './quality-assurance.js';

const reviewContext: ReviewContext = {
  taskId: 'task-1',
  initiatorAgentId: 'insight-1',
  signal: new AbortController().signal,
  logger: silentLogger,
};

describe('inspectResult', () => {
  it.each([[null], [undefined], [''], [[]], [{}]])('should flag %j as empty', (result) => {
    expect(inspectResult(result)).toEqual([{ severity: 'error', message: 'result is empty' }]);
  });

  it('should warn about a missing confidence', () => {
    expect(inspectResult({ insights: ['a'] })).toEqual([
      { severity: 'warning', message: 'result carries no confidence' },
    ]);
  });

  it('should reject confidence outside [0, 1]', () => {
    expect(inspectResult({ confidence: 1.5 })).toEqual([
      { severity: 'error', message: 'confidence must be a number in [0, 1]' },
    ]);
  });

  it('should compare confidence with the threshold', () => {
    expect(inspectResult({ confidence: 0.4 })).toEqual([{ severity: 'error', message: 'confidence 0.4 is below 0.5' }]);
    expect(inspectResult({ confidence: 0.4 }, 0.3)).toEqual([]);
  });

  it('should flag results that report an error', () => {
    expect(inspectResult({ confidence: 0.9, error: 'upstream failed' })).toEqual([
      { severity: 'error', message: 'result reports an error' },
    ]);
  });

  it('should accept plain values', () => {
    expect(inspectResult(42)).toEqual([]);
  });
});

describe('QualityAssuranceAgent', () => {
  const agent = new QualityAssuranceAgent('qa-1');

  it('should approve a confident result', async () => {
    expect(await agent.review({ insights: ['a'], confidence: 0.8 }, reviewContext)).toEqual({ verdict: 'approve' });
  });

  it('should ask for a revision of an empty result', async () => {
    expect(await agent.review({}, reviewContext)).toEqual({ verdict: 'revise', comments: 'result is empty' });
  });

  it('should reject with every error listed', async () => {
    expect(await agent.review({ confidence: 0.2, error: 'boom' }, reviewContext)).toEqual({
      verdict: 'reject',
      comments: 'confidence 0.2 is below 0.5; result reports an error',
    });
  });

  it('should validate results as a capability', async () => {
    const result = await agent.execute('validate_result', { result: { confidence: 0.7 } }, createMockExecutionContext());

    expect(result).toEqual({ valid: true, issues: [], confidence: 0.9 });
  });

  it('should use its configured threshold', async () => {
    const strict = new QualityAssuranceAgent('qa-2', 0.9);

    expect(await strict.review({ confidence: 0.8 }, reviewContext)).toEqual({
      verdict: 'reject',
      comments: 'confidence 0.8 is below 0.9',
    });
  });
});
