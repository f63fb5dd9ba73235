// Default context profiles, one per user role

import type { ContextProfile } from '@huddle/protocol';
import { ValidationError } from '../errors.js';

export const DEFAULT_CONTEXT_PROFILES: readonly ContextProfile[] = [
  {
    role: 'analyst',
    tokenBudgetFraction: 0.5,
    dataScope: 'sample_data_only',
    focusAreas: ['starter_pack', 'basic_modeling', 'educational_content'],
    visibleNotebooks: [
      'starter_pack/00_data_dictionary',
      'starter_pack/01_intro_to_data',
      'starter_pack/02_build_simple_rankings',
      'starter_pack/03_metrics_comparison',
      'starter_pack/04_team_similarity',
      'starter_pack/05_matchup_predictor',
    ],
    visibleModels: ['ridge_margin'],
    visibleFeatures: ['home_talent', 'away_talent', 'home_elo', 'away_elo', 'home_adjusted_epa', 'away_adjusted_epa'],
  },
  {
    role: 'data_scientist',
    tokenBudgetFraction: 0.75,
    dataScope: 'full_feature_set',
    focusAreas: ['model_pack', 'advanced_analytics', 'feature_engineering'],
    visibleNotebooks: [
      'model_pack/01_linear_regression_margin',
      'model_pack/02_random_forest_team_points',
      'model_pack/03_xgboost_win_probability',
      'model_pack/04_neural_win_probability',
      'model_pack/05_logistic_regression_win_probability',
      'model_pack/06_shap_interpretability',
      'model_pack/07_stacked_ensemble',
    ],
    visibleModels: ['ridge_margin', 'xgb_home_win', 'neural_home_win'],
    visibleFeatures: [
      'home_adjusted_epa',
      'away_adjusted_epa',
      'home_adjusted_success',
      'away_adjusted_success',
      'home_adjusted_explosiveness',
      'away_adjusted_explosiveness',
      'home_total_havoc_offense',
      'away_total_havoc_offense',
    ],
  },
  {
    role: 'production',
    tokenBudgetFraction: 0.25,
    dataScope: 'current_season_only',
    focusAreas: ['model_inference', 'monitoring', 'automated_analysis'],
    visibleNotebooks: ['model_pack/01_linear_regression_margin', 'model_pack/03_xgboost_win_probability'],
    visibleModels: ['ridge_margin', 'xgb_home_win'],
    visibleFeatures: ['home_talent', 'away_talent', 'spread', 'home_elo', 'away_elo'],
  },
];

/**
 * Immutable role -> profile lookup built at startup
 */
export class ProfileSet {
  private readonly byRole: ReadonlyMap<string, ContextProfile>;
  /** Smallest budget fraction; used for unrecognised roles */
  readonly mostRestrictive: ContextProfile;

  constructor(profiles: readonly ContextProfile[] = DEFAULT_CONTEXT_PROFILES) {
    if (profiles.length === 0) {
      throw new ValidationError('At least one context profile is required', { field: 'profiles' });
    }

    const byRole = new Map<string, ContextProfile>();
    for (const profile of profiles) {
      validateProfile(profile);
      if (byRole.has(profile.role)) {
        throw new ValidationError(`Duplicate context profile for role "${profile.role}"`, { field: 'role' });
      }
      byRole.set(profile.role, freezeProfile(profile));
    }

    this.byRole = byRole;
    this.mostRestrictive = Array.from(byRole.values()).reduce((min, p) =>
      p.tokenBudgetFraction < min.tokenBudgetFraction ? p : min
    );
  }

  /**
   * Profile for a role, or the most restrictive one when the role is unknown
   */
  select(role: string | undefined): ContextProfile {
    return (role !== undefined ? this.byRole.get(role) : undefined) ?? this.mostRestrictive;
  }

  has(role: string): boolean {
    return this.byRole.has(role);
  }

  roles(): string[] {
    return Array.from(this.byRole.keys());
  }
}

function validateProfile(profile: ContextProfile): void {
  const f = profile.tokenBudgetFraction;
  if (!(f > 0 && f <= 1)) {
    throw new ValidationError(`Token budget fraction for "${profile.role}" must be in (0, 1], got ${f}`, {
      field: 'tokenBudgetFraction',
    });
  }
  if (profile.focusAreas.length === 0) {
    throw new ValidationError(`Profile "${profile.role}" needs at least one focus area`, { field: 'focusAreas' });
  }
}

function freezeProfile(profile: ContextProfile): ContextProfile {
  const copy: ContextProfile = {
    ...profile,
    focusAreas: [...profile.focusAreas],
    visibleNotebooks: [...profile.visibleNotebooks],
    visibleModels: [...profile.visibleModels],
    visibleFeatures: [...profile.visibleFeatures],
  };
  Object.freeze(copy.focusAreas);
  Object.freeze(copy.visibleNotebooks);
  Object.freeze(copy.visibleModels);
  Object.freeze(copy.visibleFeatures);
  return Object.freeze(copy);
}
