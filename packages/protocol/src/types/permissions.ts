// Permission levels - the access lattice gating every capability

/**
 * Ordered access tiers. A caller holding a level may invoke any capability
 * whose required level is at or below it.
 */
export type PermissionLevel = 'read_only' | 'read_execute' | 'read_execute_write' | 'admin';

/**
 * All permission levels, lowest first
 */
export const PERMISSION_LEVELS: readonly PermissionLevel[] = [
  'read_only',
  'read_execute',
  'read_execute_write',
  'admin',
] as const;

/**
 * Rank of each level in the total order
 */
export const PERMISSION_LEVEL_RANK: Readonly<Record<PermissionLevel, number>> = {
  read_only: 1,
  read_execute: 2,
  read_execute_write: 3,
  admin: 4,
};

/**
 * Narrow an unknown value to a PermissionLevel
 */
export function isPermissionLevel(value: unknown): value is PermissionLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(PERMISSION_LEVEL_RANK, value);
}
