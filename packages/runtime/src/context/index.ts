export { ContextOptimizer, hashResources, type ContextOptimizerOptions } from './context-optimizer.js';
export { ContextCache, DEFAULT_MAX_CACHE_ENTRIES, type CacheMetrics } from './context-cache.js';
export { ProfileSet, DEFAULT_CONTEXT_PROFILES } from './profiles.js';
export { detectRole, DETECTABLE_ROLES, type DetectableRole } from './role-detection.js';
export { estimateTokens, truncateToTokens, CHARS_PER_TOKEN } from './tokens.js';
