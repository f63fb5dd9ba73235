// Base agent - capability table plus handler dispatch

import type {
  AgentDescriptor,
  Capability,
  CapabilityDefinition,
  PermissionLevel,
  Params,
} from '@huddle/protocol';
import type { AgentExecutionContext, AgentRuntime } from './types.js';
import { AgentUnavailableError, CapabilityMismatchError, ValidationError } from '../errors.js';

export const DEFAULT_MAX_CONCURRENCY = 3;

/**
 * Handler for one capability
 */
export type CapabilityHandler = (params: Params, ctx: AgentExecutionContext) => Promise<unknown>;

/**
 * A capability plus the handler that implements it
 */
export type AgentCapabilitySpec = CapabilityDefinition & {
  handler: CapabilityHandler;

  /** Defaults to true */
  available?: boolean;
  unavailableReason?: string;
};

export type BaseAgentInit = {
  agentType: string;
  agentId: string;
  name: string;
  permissionLevel: PermissionLevel;
  capabilities: AgentCapabilitySpec[];
  maxConcurrency?: number;
  expertiseDomains?: string[];
};

/**
 * Agent backed by an explicit capability table.
 *
 * Subclasses pass their capabilities to the constructor; availability is
 * decided there (e.g. after trying to load a model) and frozen with the
 * descriptor.
 */
export class BaseAgent implements AgentRuntime {
  readonly descriptor: AgentDescriptor;
  private readonly handlers = new Map<string, CapabilityHandler>();

  constructor(init: BaseAgentInit) {
    const capabilities: Capability[] = [];

    for (const spec of init.capabilities) {
      if (this.handlers.has(spec.name)) {
        throw new ValidationError(`Duplicate capability "${spec.name}" on agent ${init.agentId}`, {
          field: 'capabilities',
        });
      }
      this.handlers.set(spec.name, spec.handler);
      capabilities.push(toCapability(spec));
    }

    this.descriptor = {
      agentType: init.agentType,
      agentId: init.agentId,
      name: init.name,
      permissionLevel: init.permissionLevel,
      capabilities,
      maxConcurrency: init.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY,
      expertiseDomains: init.expertiseDomains ?? [],
    };
  }

  async execute(action: string, params: Params, ctx: AgentExecutionContext): Promise<unknown> {
    const handler = this.handlers.get(action);
    const capability = this.descriptor.capabilities.find((c) => c.name === action);

    if (!handler || !capability) {
      throw new CapabilityMismatchError(action, this.descriptor.agentType);
    }

    if (!capability.available) {
      throw new AgentUnavailableError(
        `${this.descriptor.agentId}/${action}`,
        capability.unavailableReason ?? 'capability unavailable'
      );
    }

    ctx.logger.debug(`Executing ${action}`, { agentId: this.descriptor.agentId });
    return handler(params, ctx);
  }
}

function toCapability(spec: AgentCapabilitySpec): Capability {
  const capability: Capability = {
    name: spec.name,
    description: spec.description,
    requiredPermission: spec.requiredPermission,
    toolsRequired: spec.toolsRequired ?? [],
    dataAccess: spec.dataAccess ?? [],
    executionTimeEstimateMs: spec.executionTimeEstimateMs,
    available: spec.available ?? true,
    domainTags: spec.domainTags ?? [],
  };
  if (capability.available === false) {
    capability.unavailableReason = spec.unavailableReason ?? 'unavailable';
  }
  return capability;
}

/**
 * Read a string parameter, falling back when absent or of another type
 */
export function stringParam(params: Params, key: string, fallback = ''): string {
  const value = params[key];
  return typeof value === 'string' ? value : fallback;
}

/**
 * Read a numeric parameter, falling back when absent or not finite
 */
export function numberParam(params: Params, key: string, fallback: number): number {
  const value = params[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}
