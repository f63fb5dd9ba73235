// Capability registry - agent types, their factories, and created instances
//
// Populated at startup, then frozen. After freeze() the registry is read-only,
// so the request path reads it without locking.

import type { AgentDescriptor, Capability, Id } from '@huddle/protocol';
import type { AgentDefinition, AgentRuntime } from '../agents/types.js';
import type { Logger } from '../logger.js';
import { consoleLogger, withLogContext } from '../logger.js';
import {
  AgentUnavailableError,
  CapabilityMismatchError,
  DuplicateAgentTypeError,
  RegistryFrozenError,
  ValidationError,
  errorMessage,
} from '../errors.js';

export type CapabilityRegistryOptions = {
  /**
   * Logger for structured logging (defaults to console)
   */
  logger?: Logger;
};

/**
 * Registry of agent types and the agent instances created from them.
 */
export class CapabilityRegistry {
  private readonly definitions = new Map<string, AgentDefinition>();
  private readonly agents = new Map<Id, AgentRuntime>();
  private readonly logger: Logger;
  private frozen = false;

  constructor(options: CapabilityRegistryOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Register an agent type.
   *
   * @throws DuplicateAgentTypeError if the type is already registered
   * @throws RegistryFrozenError after freeze()
   */
  register(agentType: string, definition: AgentDefinition): void {
    this.assertMutable(`register agent type "${agentType}"`);
    if (!agentType.trim()) {
      throw new ValidationError('Agent type must be a non-empty string', { field: 'agentType' });
    }
    if (this.definitions.has(agentType)) {
      throw new DuplicateAgentTypeError(agentType);
    }
    this.definitions.set(agentType, definition);
  }

  /**
   * Construct an agent instance from a registered type.
   *
   * Factory failures surface as AgentUnavailableError and leave the
   * registry usable.
   *
   * @throws CapabilityMismatchError for an unknown agent type
   * @throws AgentUnavailableError when the factory fails
   * @throws ValidationError for a duplicate agent id or a malformed descriptor
   */
  async create(agentType: string, agentId: Id): Promise<AgentRuntime> {
    this.assertMutable(`create agent "${agentId}"`);

    const definition = this.definitions.get(agentType);
    if (!definition) {
      throw new CapabilityMismatchError('create', agentType);
    }
    if (this.agents.has(agentId)) {
      throw new ValidationError(`Agent id already in use: ${agentId}`, { field: 'agentId' });
    }

    let agent: AgentRuntime;
    try {
      agent = await definition.factory({
        agentId,
        logger: withLogContext(this.logger, { agentId, agentType }),
      });
    } catch (error) {
      this.logger.warn(`Agent construction failed: ${agentType}`, { agentId, error: errorMessage(error) });
      throw new AgentUnavailableError(agentId, `construction failed: ${errorMessage(error)}`, error);
    }

    validateDescriptor(agent.descriptor, agentType, agentId);
    freezeDescriptor(agent.descriptor);

    // Re-check: another create() for the same id may have completed while the factory ran.
    if (this.agents.has(agentId)) {
      throw new ValidationError(`Agent id already in use: ${agentId}`, { field: 'agentId' });
    }
    this.agents.set(agentId, agent);

    const unavailable = agent.descriptor.capabilities.filter((c) => !c.available);
    if (unavailable.length > 0) {
      this.logger.warn(`Agent ${agentId} created with unavailable capabilities`, {
        capabilities: unavailable.map((c) => ({ name: c.name, reason: c.unavailableReason })),
      });
    }

    return agent;
  }

  /**
   * Descriptors of all created agents, sorted by agent id
   */
  list(): AgentDescriptor[] {
    return this.runtimes().map((agent) => agent.descriptor);
  }

  /**
   * All created agents, sorted by agent id
   */
  runtimes(): AgentRuntime[] {
    return Array.from(this.agents.values()).sort((a, b) =>
      compareIds(a.descriptor.agentId, b.descriptor.agentId)
    );
  }

  get(agentId: Id): AgentRuntime | undefined {
    return this.agents.get(agentId);
  }

  has(agentType: string): boolean {
    return this.definitions.has(agentType);
  }

  /**
   * Registered agent types
   */
  listTypes(): string[] {
    return Array.from(this.definitions.keys());
  }

  /**
   * Stop accepting registrations and instance creation.
   */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  private assertMutable(operation: string): void {
    if (this.frozen) {
      throw new RegistryFrozenError(operation);
    }
  }
}

/**
 * Code-unit comparison, independent of locale
 */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function validateDescriptor(descriptor: AgentDescriptor, agentType: string, agentId: Id): void {
  if (descriptor.agentType !== agentType || descriptor.agentId !== agentId) {
    throw new ValidationError(
      `Factory for "${agentType}" returned agent ${descriptor.agentType}/${descriptor.agentId}`,
      { field: 'descriptor' }
    );
  }
  if (!Number.isInteger(descriptor.maxConcurrency) || descriptor.maxConcurrency < 1) {
    throw new ValidationError(`Agent ${agentId} must allow at least one concurrent invocation`, {
      field: 'maxConcurrency',
    });
  }

  const names = new Set<string>();
  for (const capability of descriptor.capabilities) {
    if (names.has(capability.name)) {
      throw new ValidationError(`Duplicate capability "${capability.name}" on agent ${agentId}`, {
        field: 'capabilities',
      });
    }
    names.add(capability.name);
  }
}

function freezeDescriptor(descriptor: AgentDescriptor): void {
  descriptor.capabilities.forEach((capability: Capability) => {
    if (capability.domainTags) Object.freeze(capability.domainTags);
    Object.freeze(capability.toolsRequired);
    Object.freeze(capability.dataAccess);
    Object.freeze(capability);
  });
  Object.freeze(descriptor.capabilities);
  Object.freeze(descriptor.expertiseDomains);
  Object.freeze(descriptor);
}
