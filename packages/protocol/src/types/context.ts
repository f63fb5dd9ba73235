// Context profile and budgeted context types

import type { Id } from './common.js';

/**
 * Kinds of contextual resource a profile can see
 */
export type ContextResourceKind = 'notebook' | 'model' | 'feature' | 'document';

/**
 * One piece of contextual state handed to agents.
 */
export type ContextResource = {
  id: Id;
  kind: ContextResourceKind;

  /** Focus area the resource belongs to */
  focusArea: string;

  content: string;
};

/**
 * Unreduced context bundle
 */
export type RawContext = {
  resources: ContextResource[];
};

/**
 * Per-role context budget. Defined at startup and frozen.
 */
export type ContextProfile = {
  role: string;

  /** Share of the global token budget, 0 < f <= 1 */
  tokenBudgetFraction: number;

  /** Data scope label */
  dataScope: string;

  /** Priority-ordered, highest first */
  focusAreas: string[];

  visibleNotebooks: string[];
  visibleModels: string[];
  visibleFeatures: string[];
};

/**
 * Context reduced to fit the role's budget
 */
export type OptimizedContext = {
  role: string;
  profile: ContextProfile;
  resources: ContextResource[];
  estimatedTokens: number;
  tokenBudget: number;
  droppedFocusAreas: string[];
  truncated: boolean;
  contentHash: string;
  cacheHit: boolean;
};
