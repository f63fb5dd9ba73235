// Role detection heuristics
//
// An explicit role hint in the user context wins when a profile exists for
// it. Otherwise each role is scored from the notebooks and models the
// caller mentions and from keywords in the query; the highest score wins,
// ties going to the earlier role in DETECTABLE_ROLES.

import type { UserContext } from '@huddle/protocol';

export const DETECTABLE_ROLES = ['analyst', 'data_scientist', 'production'] as const;

export type DetectableRole = (typeof DETECTABLE_ROLES)[number];

/**
 * Keyword groups, checked in order; only the first matching group scores
 */
const QUERY_KEYWORDS: Array<{ role: DetectableRole; keywords: string[] }> = [
  { role: 'analyst', keywords: ['learn', 'tutorial', 'introduction', 'explain'] },
  { role: 'production', keywords: ['predict', 'production', 'api', 'deploy'] },
  { role: 'data_scientist', keywords: ['feature', 'model', 'optimize', 'advanced'] },
];

export type RoleDetectionInput = {
  query: string;
  userContext: UserContext;
  /** Roles with a profile; hints naming other roles are ignored */
  knownRoles: (role: string) => boolean;
};

export function detectRole({ query, userContext, knownRoles }: RoleDetectionInput): string {
  if (userContext.role && knownRoles(userContext.role)) {
    return userContext.role;
  }

  const scores: Record<DetectableRole, number> = { analyst: 0, data_scientist: 0, production: 0 };

  const notebooks = stringList(userContext.notebooks);
  for (const notebook of notebooks) {
    if (notebook.includes('starter_pack')) {
      scores.analyst += 2;
    } else if (notebook.includes('model_pack')) {
      scores.data_scientist += 2;
      if (notebook.includes('shap') || notebook.includes('ensemble')) {
        scores.data_scientist += 1;
      }
    }
  }

  const models = stringList(userContext.models);
  for (const model of models) {
    if (model.includes('ridge') && models.length === 1) {
      scores.production += 2;
    } else if (model.includes('neural') || model.includes('xgb')) {
      scores.data_scientist += 2;
    }
  }

  const text = query.toLowerCase();
  const group = QUERY_KEYWORDS.find(({ keywords }) => keywords.some((k) => text.includes(k)));
  if (group) {
    scores[group.role] += 2;
  }

  let best: DetectableRole = DETECTABLE_ROLES[0];
  for (const role of DETECTABLE_ROLES) {
    if (scores[role] > scores[best]) best = role;
  }
  return best;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}
