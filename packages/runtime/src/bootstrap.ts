// Bootstrap - wire a ready-to-use orchestrator from configuration
//
// Storage is chosen from the config: Postgres when a database URL is set,
// NDJSON files when a data directory is set, in-memory otherwise.

import {
  createInMemoryRepositoryContext,
  ndjson,
  postgres,
  type RepositoryContext,
} from '@huddle/repositories';
import type { HuddleConfig } from './config.js';
import type { Logger } from './logger.js';
import { consoleLogger } from './logger.js';
import { errorMessage } from './errors.js';
import { CapabilityRegistry } from './registry/capability-registry.js';
import { LoadTracker } from './router/load-tracker.js';
import { RequestRouter } from './router/request-router.js';
import { ContextOptimizer } from './context/context-optimizer.js';
import { ConversationMemory } from './memory/conversation-memory.js';
import { CollaborationManager } from './collaboration/collaboration-manager.js';
import { SportsDataClient } from './external/sports-data-client.js';
import { Orchestrator, type ContextSource } from './orchestrator/orchestrator.js';
import { createBuiltinAgentDefinitions, type BuiltinAgentOptions } from './agents/builtin/index.js';
import type { AgentDefinition } from './agents/types.js';

export type HuddleOptions = {
  config: HuddleConfig;

  /** Overrides the storage chosen from the config */
  repositories?: RepositoryContext;

  /** Defaults to the built-in agents */
  definitions?: Record<string, AgentDefinition>;

  /** Passed to the built-in agents when `definitions` is not given */
  builtins?: Omit<BuiltinAgentOptions, 'sportsData'>;

  contextSource?: ContextSource;
  now?: () => number;
  logger?: Logger;
};

export type Huddle = {
  orchestrator: Orchestrator;
  registry: CapabilityRegistry;
  memory: ConversationMemory;
  collaboration: CollaborationManager;
  repositories: RepositoryContext;

  /** Agent types whose factory failed */
  failedAgentTypes: string[];

  /**
   * Stop the idle-session sweep, end every active session, retry unsaved
   * summaries, then release storage connections
   */
  close(): Promise<void>;
};

/**
 * Register every agent type, create one agent of each as `<type>-1`,
 * freeze the registry and build the orchestrator around it.
 */
export async function createHuddle(options: HuddleOptions): Promise<Huddle> {
  const { config } = options;
  const logger = options.logger ?? consoleLogger;
  const storage = options.repositories
    ? { repositories: options.repositories, close: async () => {} }
    : openRepositories(config);

  const definitions =
    options.definitions ??
    createBuiltinAgentDefinitions({
      ...options.builtins,
      sportsData: config.sportsData.apiKey
        ? new SportsDataClient({
            baseUrl: config.sportsData.baseUrl,
            apiKey: config.sportsData.apiKey,
            maxRequestsPerSecond: config.sportsData.maxRequestsPerSecond,
            maxRetries: config.sportsData.maxRetries,
            logger,
          })
        : undefined,
    });

  const registry = new CapabilityRegistry({ logger });
  const failedAgentTypes: string[] = [];
  for (const [agentType, definition] of Object.entries(definitions)) {
    registry.register(agentType, definition);
    try {
      await registry.create(agentType, `${agentType}-1`);
    } catch (error) {
      failedAgentTypes.push(agentType);
      logger.warn(`Agent type ${agentType} could not be created`, { error: errorMessage(error) });
    }
  }
  registry.freeze();

  const loads = new LoadTracker();
  const memory = new ConversationMemory({
    summaries: storage.repositories.sessionSummaries,
    maxTurnsPerUser: config.maxTurnsPerUser,
    recentTurns: config.recentTurnsInContext,
    idleTimeoutMs: config.sessionIdleTimeoutMs,
    now: options.now,
    logger,
  });
  const collaboration = new CollaborationManager({
    registry,
    knowledge: storage.repositories.knowledge,
    loads,
    reviewersPerTask: config.reviewersPerTask,
    reviewTimeoutMs: config.reviewTimeoutMs,
    now: options.now,
    logger,
  });
  const orchestrator = new Orchestrator({
    registry,
    memory,
    collaboration,
    router: new RequestRouter({ registry, loadTracker: loads }),
    contextOptimizer: new ContextOptimizer({
      globalTokenBudget: config.globalTokenBudget,
      cacheTtlMs: config.cacheTtlMs,
      now: options.now,
      logger,
    }),
    contextSource: options.contextSource,
    maxWorkers: config.maxWorkers,
    subtaskTimeoutMs: config.subtaskTimeoutMs,
    now: options.now,
    logger,
  });

  const sweep = setInterval(() => {
    memory.expireIdleSessions().catch((error: unknown) => {
      logger.warn('Idle session sweep failed', { error: errorMessage(error) });
    });
  }, config.sessionSweepIntervalMs);
  sweep.unref();

  logger.info('Huddle ready', {
    agents: registry.list().length,
    failedAgentTypes,
  });

  return {
    orchestrator,
    registry,
    memory,
    collaboration,
    repositories: storage.repositories,
    failedAgentTypes,
    close: async () => {
      clearInterval(sweep);
      await memory.endAllSessions();
      await memory.flushPending();
      await storage.close();
    },
  };
}

function openRepositories(config: HuddleConfig): { repositories: RepositoryContext; close: () => Promise<void> } {
  if (config.databaseUrl) {
    const { db, client } = postgres.createDatabase({ connectionString: config.databaseUrl });
    return { repositories: postgres.createPgRepositoryContext(db), close: () => client.end() };
  }
  if (config.dataDirectory) {
    return {
      repositories: ndjson.createNdjsonRepositoryContext({ directory: config.dataDirectory }),
      close: async () => {},
    };
  }
  return { repositories: createInMemoryRepositoryContext(), close: async () => {} };
}
