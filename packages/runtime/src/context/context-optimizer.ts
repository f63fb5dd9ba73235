// Context optimizer - fits a role's context into its token budget
//
// 1. pick the role's profile (the most restrictive one for unknown roles)
// 2. keep resources the profile can see, grouped by its focus areas
// 3. drop whole focus areas from the lowest priority up until within budget;
//    the highest-priority area is never dropped and is truncated instead
// 4. cache by (role, content hash) with a TTL

import { createHash } from 'node:crypto';
import type {
  ContextProfile,
  ContextResource,
  OptimizedContext,
  RawContext,
  UserContext,
} from '@huddle/protocol';
import type { Logger } from '../logger.js';
import { consoleLogger } from '../logger.js';
import { DEFAULT_CACHE_TTL_MS, DEFAULT_GLOBAL_TOKEN_BUDGET } from '../config.js';
import { ContextCache, type CacheMetrics } from './context-cache.js';
import { ProfileSet, DEFAULT_CONTEXT_PROFILES } from './profiles.js';
import { detectRole } from './role-detection.js';
import { estimateTokens, truncateToTokens } from './tokens.js';

export type ContextOptimizerOptions = {
  profiles?: readonly ContextProfile[];

  /** Total tokens before applying a profile's fraction (default: 100000) */
  globalTokenBudget?: number;

  /** Cache entry lifetime (default: 5 minutes) */
  cacheTtlMs?: number;

  maxCacheEntries?: number;

  /** Clock for cache expiry */
  now?: () => number;

  /**
   * Logger for structured logging (defaults to console)
   */
  logger?: Logger;
};

type ReducedContext = Omit<OptimizedContext, 'cacheHit'>;

export class ContextOptimizer {
  readonly profiles: ProfileSet;
  private readonly globalTokenBudget: number;
  private readonly cache: ContextCache<ReducedContext>;
  private readonly logger: Logger;

  constructor(options: ContextOptimizerOptions = {}) {
    this.profiles = new ProfileSet(options.profiles ?? DEFAULT_CONTEXT_PROFILES);
    this.globalTokenBudget = options.globalTokenBudget ?? DEFAULT_GLOBAL_TOKEN_BUDGET;
    this.cache = new ContextCache<ReducedContext>({
      ttlMs: options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS,
      maxEntries: options.maxCacheEntries,
      now: options.now,
    });
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Reduce `raw` to fit the budget of `role`'s profile.
   * Never fails for oversized input; the result always fits the budget.
   */
  async loadOptimizedContext(role: string, raw: RawContext): Promise<OptimizedContext> {
    const profile = this.profiles.select(role);
    if (profile.role !== role) {
      this.logger.debug(`Unknown role "${role}", using profile "${profile.role}"`);
    }

    const contentHash = hashResources(raw.resources);
    const { value, hit } = await this.cache.getOrCompute(`${profile.role}:${contentHash}`, async () =>
      this.reduce(profile, raw, contentHash)
    );

    if (!hit) {
      this.logger.debug(`Optimized context for ${profile.role}`, {
        estimatedTokens: value.estimatedTokens,
        tokenBudget: value.tokenBudget,
        droppedFocusAreas: value.droppedFocusAreas,
        truncated: value.truncated,
      });
    }

    return { ...value, resources: value.resources.map((r) => ({ ...r })), cacheHit: hit };
  }

  /**
   * Role to use for a request: a known explicit hint, else heuristics
   */
  detectRole(query: string, userContext: UserContext): string {
    return detectRole({ query, userContext, knownRoles: (r) => this.profiles.has(r) });
  }

  /**
   * Token budget for a role
   */
  budgetFor(role: string): number {
    return Math.floor(this.profiles.select(role).tokenBudgetFraction * this.globalTokenBudget);
  }

  cacheMetrics(): CacheMetrics {
    return this.cache.metrics();
  }

  /**
   * Drop cached contexts for one role, or for all roles
   */
  invalidate(role?: string): number {
    return this.cache.invalidate(role === undefined ? undefined : `${role}:`);
  }

  private reduce(profile: ContextProfile, raw: RawContext, contentHash: string): ReducedContext {
    const tokenBudget = Math.floor(profile.tokenBudgetFraction * this.globalTokenBudget);

    // Visible resources grouped by focus area, highest priority first
    const groups = profile.focusAreas.map((area) => ({
      area,
      resources: raw.resources.filter((r) => r.focusArea === area && isVisible(profile, r)),
    }));

    const droppedFocusAreas: string[] = [];
    let total = sumTokens(groups.flatMap((g) => g.resources));

    while (total > tokenBudget && groups.length > 1) {
      const dropped = groups.pop();
      if (!dropped) break;
      droppedFocusAreas.push(dropped.area);
      total -= sumTokens(dropped.resources);
    }

    let truncated = false;
    let resources = groups.flatMap((g) => g.resources);

    if (total > tokenBudget) {
      // Only the highest-priority area is left and it alone is over budget.
      resources = fitResources(resources, tokenBudget);
      truncated = true;
      total = sumTokens(resources);
    }

    return {
      role: profile.role,
      profile,
      resources,
      estimatedTokens: total,
      tokenBudget,
      droppedFocusAreas,
      truncated,
      contentHash,
    };
  }
}

function isVisible(profile: ContextProfile, resource: ContextResource): boolean {
  switch (resource.kind) {
    case 'notebook':
      return profile.visibleNotebooks.includes(resource.id);
    case 'model':
      return profile.visibleModels.includes(resource.id);
    case 'feature':
      return profile.visibleFeatures.includes(resource.id);
    case 'document':
      return true;
  }
}

function sumTokens(resources: ContextResource[]): number {
  return resources.reduce((sum, r) => sum + estimateTokens(r.content), 0);
}

/**
 * Keep resources in order while they fit; cut the first one that does not
 * and drop the rest. The first resource is always kept, possibly empty.
 */
function fitResources(resources: ContextResource[], budget: number): ContextResource[] {
  const kept: ContextResource[] = [];
  let remaining = budget;

  for (const resource of resources) {
    const tokens = estimateTokens(resource.content);
    if (tokens <= remaining) {
      kept.push(resource);
      remaining -= tokens;
      continue;
    }
    if (remaining > 0 || kept.length === 0) {
      kept.push({ ...resource, content: truncateToTokens(resource.content, remaining) });
    }
    break;
  }

  return kept;
}

/**
 * Stable hash of the resource set
 */
export function hashResources(resources: ContextResource[]): string {
  const hash = createHash('sha256');
  for (const r of resources) {
    hash.update(JSON.stringify([r.id, r.kind, r.focusArea, r.content]));
    hash.update('\n');
  }
  return hash.digest('hex');
}
