export {
  permits,
  comparePermissionLevels,
  assertPermits,
  callerPermission,
  DEFAULT_CALLER_PERMISSION,
} from './permissions.js';
