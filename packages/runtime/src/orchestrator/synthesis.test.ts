// Tests for result synthesis

import { describe, it, expect } from 'vitest';
import { synthesize, confidenceOf, type SubtaskResult } from './synthesis.js';

function result(subtaskId: string, value: unknown, overrides: Partial<SubtaskResult> = {}): SubtaskResult {
  return {
    subtaskId,
    resultKey: subtaskId,
    agentId: `${subtaskId}-agent`,
    agentPermission: 'read_execute',
    result: value,
    ...overrides,
  };
}

describe('synthesize', () => {
  it('should key results by result key in plan order', () => {
    const { merged, conflicts } = synthesize([result('b', 2), result('a', 1)]);

    expect(Array.from(merged.entries())).toEqual([
      ['b', 2],
      ['a', 1],
    ]);
    expect(conflicts).toEqual([]);
  });

  it('should merge equal results silently', () => {
    const { merged, conflicts } = synthesize([
      result('x', { winner: 'Army' }, { resultKey: 'pick' }),
      result('y', { winner: 'Army' }, { resultKey: 'pick' }),
    ]);

    expect(merged.get('pick')).toEqual({ winner: 'Army' });
    expect(conflicts).toEqual([]);
  });

  it('should prefer the higher confidence', () => {
    const { merged } = synthesize([
      result('x', { winner: 'Army', confidence: 0.6 }, { resultKey: 'pick' }),
      result('y', { winner: 'Navy', confidence: 0.8 }, { resultKey: 'pick' }),
    ]);

    expect(merged.get('pick')).toEqual({ winner: 'Navy', confidence: 0.8 });
  });

  it('should fall back to the higher agent permission', () => {
    const { merged } = synthesize([
      result('x', { winner: 'Army' }, { resultKey: 'pick', agentPermission: 'admin' }),
      result('y', { winner: 'Navy' }, { resultKey: 'pick', agentPermission: 'read_only' }),
    ]);

    expect(merged.get('pick')).toEqual({ winner: 'Army' });
  });

  it('should surface both results when nothing breaks the tie', () => {
    const { merged, conflicts } = synthesize([
      result('x', { winner: 'Army', confidence: 0.7 }, { resultKey: 'pick' }),
      result('y', { winner: 'Navy', confidence: 0.7 }, { resultKey: 'pick' }),
    ]);

    expect(merged.has('pick')).toBe(false);
    expect(conflicts).toEqual([
      {
        resultKey: 'pick',
        candidates: [
          { subtaskId: 'x', agentId: 'x-agent', result: { winner: 'Army', confidence: 0.7 }, confidence: 0.7 },
          { subtaskId: 'y', agentId: 'y-agent', result: { winner: 'Navy', confidence: 0.7 }, confidence: 0.7 },
        ],
        reason: 'results differ with equal confidence and agent permission',
      },
    ]);
  });

  it('should keep a result that failed review but report it', () => {
    const { merged, conflicts } = synthesize([result('x', 'text', { reviewConflict: '0 of 1 approved, 1 rejected' })]);

    expect(merged.get('x')).toBe('text');
    expect(conflicts).toEqual([
      {
        resultKey: 'x',
        candidates: [{ subtaskId: 'x', agentId: 'x-agent', result: 'text', confidence: undefined }],
        reason: 'peer review did not approve: 0 of 1 approved, 1 rejected',
      },
    ]);
  });
});

describe('confidenceOf', () => {
  it('should only read confidences in range', () => {
    expect(confidenceOf({ confidence: 0.4 })).toBe(0.4);
    expect(confidenceOf({ confidence: 1.4 })).toBeUndefined();
    expect(confidenceOf('0.4')).toBeUndefined();
    expect(confidenceOf(null)).toBeUndefined();
  });
});
