// Agent descriptor types

import type { Id } from './common.js';
import type { PermissionLevel } from './permissions.js';

/**
 * A named, permission-gated operation an agent exposes.
 */
export type Capability = {
  /**
   * Action name, unique within one agent
   */
  name: string;

  /**
   * Human description
   */
  description: string;

  /**
   * Minimum level required to invoke this capability
   */
  requiredPermission: PermissionLevel;

  /**
   * External tools the capability depends on
   */
  toolsRequired: string[];

  /**
   * Data-access paths the capability reads or writes
   */
  dataAccess: string[];

  /**
   * Estimated execution time, used as a routing tie-break
   */
  executionTimeEstimateMs: number;

  /**
   * False when a dependency failed to load; the router never offers
   * an unavailable capability.
   */
  available: boolean;

  /**
   * Why the capability is unavailable
   */
  unavailableReason?: string;

  /**
   * Domain tags used by expert routing
   */
  domainTags?: string[];
};

/**
 * Describes one agent instance.
 */
export type AgentDescriptor = {
  /** Agent-type identifier (registry key) */
  agentType: string;

  /** Unique instance id */
  agentId: Id;

  /** Human name */
  name: string;

  /** Permission level the agent itself holds */
  permissionLevel: PermissionLevel;

  /** Ordered capability list */
  capabilities: Capability[];

  /** Maximum in-flight invocations before the router skips this agent */
  maxConcurrency: number;

  /** Domains the agent is considered an expert in */
  expertiseDomains: string[];
};

/**
 * Capability definition as written by agent authors; availability and
 * optional lists are filled in with defaults.
 */
export type CapabilityDefinition = Pick<
  Capability,
  'name' | 'description' | 'requiredPermission' | 'executionTimeEstimateMs'
> &
  Partial<Pick<Capability, 'toolsRequired' | 'dataAccess' | 'domainTags'>>;
