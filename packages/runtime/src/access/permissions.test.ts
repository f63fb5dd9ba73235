// Tests for permission checks

import { describe, it, expect } from 'vitest';
import { PERMISSION_LEVELS } from '@huddle/protocol';
import { permits, comparePermissionLevels, assertPermits, callerPermission } from './permissions.js';
import { PermissionDeniedError } from '../errors.js';

describe('permits', () => {
  it('should respect the total order for every pair', () => {
    for (const [i, held] of PERMISSION_LEVELS.entries()) {
      for (const [j, required] of PERMISSION_LEVELS.entries()) {
        expect(permits(held, required)).toBe(i >= j);
      }
    }
  });

  it('should be a function of its arguments alone', () => {
    const first = PERMISSION_LEVELS.map((held) => PERMISSION_LEVELS.map((req) => permits(held, req)));
    permits('admin', 'read_only');
    permits('garbage', 'admin');
    const second = PERMISSION_LEVELS.map((held) => PERMISSION_LEVELS.map((req) => permits(held, req)));

    expect(second).toEqual(first);
  });

  it('should deny malformed input', () => {
    expect(permits('superuser', 'read_only')).toBe(false);
    expect(permits('admin', 'root')).toBe(false);
    expect(permits(undefined, 'read_only')).toBe(false);
    expect(permits(4, 1)).toBe(false);
    expect(permits('toString', 'read_only')).toBe(false);
  });
});

describe('comparePermissionLevels', () => {
  it('should order levels', () => {
    expect(comparePermissionLevels('read_only', 'admin')).toBeLessThan(0);
    expect(comparePermissionLevels('admin', 'read_execute_write')).toBeGreaterThan(0);
    expect(comparePermissionLevels('read_execute', 'read_execute')).toBe(0);
  });
});

describe('assertPermits', () => {
  it('should throw PermissionDeniedError with both levels', () => {
    expect(() => assertPermits('predict_outcome', 'read_execute', 'admin')).toThrow(PermissionDeniedError);

    try {
      assertPermits('predict_outcome', 'read_execute', 'admin');
    } catch (error) {
      expect(error).toBeInstanceOf(PermissionDeniedError);
      if (error instanceof PermissionDeniedError) {
        expect(error.held).toBe('read_execute');
        expect(error.required).toBe('admin');
        expect(error.code).toBe('PERMISSION_DENIED');
      }
    }
  });

  it('should default absent caller levels to read_only', () => {
    expect(callerPermission(undefined)).toBe('read_only');
    expect(callerPermission('admin')).toBe('admin');
  });
});
