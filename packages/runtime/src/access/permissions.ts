// Permission checks - the hard gate in front of every capability
//
// Levels form a total order: read_only < read_execute < read_execute_write < admin.
// Checks are pure functions of their arguments. Anything that is not a
// recognised level is denied rather than coerced.

import { PERMISSION_LEVEL_RANK, isPermissionLevel, type PermissionLevel } from '@huddle/protocol';
import { PermissionDeniedError } from '../errors.js';

/**
 * Level assumed for callers that do not state one
 */
export const DEFAULT_CALLER_PERMISSION: PermissionLevel = 'read_only';

/**
 * Whether `held` is at or above `required`. Malformed input on either side denies.
 */
export function permits(held: unknown, required: unknown): boolean {
  if (!isPermissionLevel(held) || !isPermissionLevel(required)) {
    return false;
  }
  return PERMISSION_LEVEL_RANK[held] >= PERMISSION_LEVEL_RANK[required];
}

/**
 * Compare two permission levels
 * @returns negative if a < b, 0 if equal, positive if a > b
 */
export function comparePermissionLevels(a: PermissionLevel, b: PermissionLevel): number {
  return PERMISSION_LEVEL_RANK[a] - PERMISSION_LEVEL_RANK[b];
}

/**
 * Throw PermissionDeniedError unless `held` permits `required`.
 */
export function assertPermits(
  action: string,
  held: unknown,
  required: PermissionLevel,
  subject = 'caller'
): void {
  if (!permits(held, required)) {
    throw new PermissionDeniedError(action, isPermissionLevel(held) ? held : undefined, required, subject);
  }
}

/**
 * Resolve the caller's level, defaulting when absent
 */
export function callerPermission(level: PermissionLevel | undefined): PermissionLevel {
  return level ?? DEFAULT_CALLER_PERMISSION;
}
