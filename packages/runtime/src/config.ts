// Runtime configuration
//
// One zod schema holds every tunable with its default. loadConfig merges
// overrides over the defaults; loadConfigFromEnv reads HUDDLE_* variables.

import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_GLOBAL_TOKEN_BUDGET = 100_000;
export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;
export const DEFAULT_MAX_TURNS_PER_USER = 10;
export const DEFAULT_RECENT_TURNS_IN_CONTEXT = 5;
export const DEFAULT_SESSION_IDLE_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_SESSION_SWEEP_INTERVAL_MS = 60_000;
export const DEFAULT_MAX_WORKERS = 4;
export const DEFAULT_SUBTASK_TIMEOUT_MS = 30_000;
export const DEFAULT_REVIEWERS_PER_TASK = 1;
export const DEFAULT_REVIEW_TIMEOUT_MS = 10_000;
export const DEFAULT_SPORTS_DATA_BASE_URL = 'https://api.collegefootballdata.com';

const positiveInt = z.coerce.number().int().positive();

export const sportsDataConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_SPORTS_DATA_BASE_URL),
  apiKey: z.string().min(1).optional(),
  maxRequestsPerSecond: z.coerce.number().positive().default(6),
  maxRetries: z.coerce.number().int().nonnegative().default(3),
});

export const huddleConfigSchema = z.object({
  globalTokenBudget: positiveInt.default(DEFAULT_GLOBAL_TOKEN_BUDGET),
  cacheTtlMs: positiveInt.default(DEFAULT_CACHE_TTL_MS),
  maxTurnsPerUser: positiveInt.default(DEFAULT_MAX_TURNS_PER_USER),
  recentTurnsInContext: positiveInt.default(DEFAULT_RECENT_TURNS_IN_CONTEXT),
  sessionIdleTimeoutMs: positiveInt.default(DEFAULT_SESSION_IDLE_TIMEOUT_MS),
  sessionSweepIntervalMs: positiveInt.default(DEFAULT_SESSION_SWEEP_INTERVAL_MS),
  maxWorkers: positiveInt.default(DEFAULT_MAX_WORKERS),
  subtaskTimeoutMs: positiveInt.default(DEFAULT_SUBTASK_TIMEOUT_MS),
  reviewersPerTask: positiveInt.default(DEFAULT_REVIEWERS_PER_TASK),
  reviewTimeoutMs: positiveInt.default(DEFAULT_REVIEW_TIMEOUT_MS),
  dataDirectory: z.string().min(1).optional(),
  databaseUrl: z.string().min(1).optional(),
  sportsData: sportsDataConfigSchema.default({}),
});

export type HuddleConfig = z.infer<typeof huddleConfigSchema>;
export type HuddleConfigInput = z.input<typeof huddleConfigSchema>;
export type SportsDataConfig = z.infer<typeof sportsDataConfigSchema>;

/**
 * Build a config from overrides, filling in defaults.
 * @throws ConfigError listing every invalid path
 */
export function loadConfig(overrides: HuddleConfigInput = {}): HuddleConfig {
  return parseConfig(overrides);
}

function parseConfig(input: unknown): HuddleConfig {
  const parsed = huddleConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Environment variable for each top-level setting
 */
const ENV_KEYS = {
  globalTokenBudget: 'HUDDLE_GLOBAL_TOKEN_BUDGET',
  cacheTtlMs: 'HUDDLE_CACHE_TTL_MS',
  maxTurnsPerUser: 'HUDDLE_MAX_TURNS_PER_USER',
  recentTurnsInContext: 'HUDDLE_RECENT_TURNS',
  sessionIdleTimeoutMs: 'HUDDLE_SESSION_IDLE_TIMEOUT_MS',
  sessionSweepIntervalMs: 'HUDDLE_SESSION_SWEEP_INTERVAL_MS',
  maxWorkers: 'HUDDLE_MAX_WORKERS',
  subtaskTimeoutMs: 'HUDDLE_SUBTASK_TIMEOUT_MS',
  reviewersPerTask: 'HUDDLE_REVIEWERS_PER_TASK',
  reviewTimeoutMs: 'HUDDLE_REVIEW_TIMEOUT_MS',
  dataDirectory: 'HUDDLE_DATA_DIR',
  databaseUrl: 'DATABASE_URL',
} as const;

/**
 * Build a config from environment variables. Unset or empty variables
 * fall back to defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): HuddleConfig {
  const input: Record<string, unknown> = {};

  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      input[key] = value;
    }
  }

  const sportsData: Record<string, unknown> = {};
  if (env.SPORTS_DATA_HOST) sportsData.baseUrl = env.SPORTS_DATA_HOST;
  if (env.SPORTS_DATA_API_KEY) sportsData.apiKey = env.SPORTS_DATA_API_KEY;
  if (env.SPORTS_DATA_MAX_RPS) sportsData.maxRequestsPerSecond = env.SPORTS_DATA_MAX_RPS;
  input.sportsData = sportsData;

  return parseConfig(input);
}
