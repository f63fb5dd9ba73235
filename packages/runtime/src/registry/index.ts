export { CapabilityRegistry, compareIds, type CapabilityRegistryOptions } from './capability-registry.js';
