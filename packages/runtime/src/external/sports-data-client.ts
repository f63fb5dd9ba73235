// Sports data API client
//
// Calls are serialized through a limiter that keeps a fixed minimum delay
// between request starts. 5xx responses and transport failures are
// retried with exponential backoff; 4xx responses are not.

import { z } from 'zod';
import type { Logger } from '../logger.js';
import { consoleLogger } from '../logger.js';
import {
  NotFoundError,
  RateLimitedError,
  SportsDataError,
  UnauthorizedError,
  UpstreamError,
  errorMessage,
} from '../errors.js';
import { DEFAULT_SPORTS_DATA_BASE_URL } from '../config.js';

export const DEFAULT_GRAPHQL_URL = 'https://graphql.collegefootballdata.com/v1/graphql';
export const DEFAULT_MAX_REQUESTS_PER_SECOND = 6;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BACKOFF_BASE_MS = 500;

/**
 * The subset of the fetch Response the client reads
 */
export type HttpResponse = {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
};

export type HttpRequestInit = {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
};

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export const gameSchema = z
  .object({
    id: z.number(),
    season: z.number(),
    week: z.number(),
    homeTeam: z.string(),
    awayTeam: z.string(),
    homePoints: z.number().nullish(),
    awayPoints: z.number().nullish(),
    startDate: z.string().optional(),
  })
  .passthrough();

export type Game = z.infer<typeof gameSchema>;

export const teamStatSchema = z
  .object({
    season: z.number(),
    team: z.string(),
    statName: z.string(),
    statValue: z.union([z.number(), z.string()]),
  })
  .passthrough();

export type TeamStat = z.infer<typeof teamStatSchema>;

const graphqlResponseSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).optional(),
});

export type GamesQuery = {
  season: number;
  week?: number;
  team?: string;
};

export type TeamStatsQuery = {
  season: number;
  team?: string;
};

export type SportsDataClientOptions = {
  baseUrl?: string;
  graphqlUrl?: string;
  apiKey?: string;

  /** Minimum delay between request starts; wins over maxRequestsPerSecond */
  minDelayMs?: number;
  maxRequestsPerSecond?: number;

  /** Retries after the first attempt for 5xx and transport errors */
  maxRetries?: number;
  backoffBaseMs?: number;

  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;

  /**
   * Logger for structured logging (defaults to console)
   */
  logger?: Logger;
};

export type SportsDataClientMetrics = {
  requests: number;
  retries: number;
  rateLimited: number;
  failures: number;
};

type RequestSpec = {
  method: 'GET' | 'POST';
  url: string;
  /** Used in errors and logs */
  label: string;
  body?: unknown;
  signal?: AbortSignal;
};

export class SportsDataClient {
  private readonly baseUrl: string;
  private readonly graphqlUrl: string;
  private readonly apiKey?: string;
  private readonly minDelayMs: number;
  private readonly maxRetries: number;
  private readonly backoffBaseMs: number;
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;

  private lastRequestAt = Number.NEGATIVE_INFINITY;
  private queue: Promise<void> = Promise.resolve();
  private readonly counters: SportsDataClientMetrics = { requests: 0, retries: 0, rateLimited: 0, failures: 0 };

  constructor(options: SportsDataClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_SPORTS_DATA_BASE_URL).replace(/\/+$/, '');
    this.graphqlUrl = options.graphqlUrl ?? DEFAULT_GRAPHQL_URL;
    this.apiKey = options.apiKey;
    this.minDelayMs =
      options.minDelayMs ?? 1000 / (options.maxRequestsPerSecond ?? DEFAULT_MAX_REQUESTS_PER_SECOND);
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? consoleLogger;
  }

  async getGames(query: GamesQuery, signal?: AbortSignal): Promise<Game[]> {
    const url = this.url('/games', { year: query.season, week: query.week, team: query.team });
    const body = await this.request({ method: 'GET', url, label: '/games', signal });
    return parseBody(z.array(gameSchema), body, '/games');
  }

  async getTeamStats(query: TeamStatsQuery, signal?: AbortSignal): Promise<TeamStat[]> {
    const url = this.url('/stats/season', { year: query.season, team: query.team });
    const body = await this.request({ method: 'GET', url, label: '/stats/season', signal });
    return parseBody(z.array(teamStatSchema), body, '/stats/season');
  }

  /**
   * Run a GraphQL query and return its `data`.
   *
   * @throws SportsDataError with code GRAPHQL_ERROR when the response lists errors
   */
  async graphql(query: string, variables: Record<string, unknown> = {}, signal?: AbortSignal): Promise<unknown> {
    const body = await this.request({
      method: 'POST',
      url: this.graphqlUrl,
      label: 'graphql',
      body: { query, variables },
      signal,
    });
    const parsed = parseBody(graphqlResponseSchema, body, 'graphql');

    if (parsed.errors && parsed.errors.length > 0) {
      throw new SportsDataError('GRAPHQL_ERROR', `GraphQL query failed: ${parsed.errors.map((e) => e.message).join('; ')}`);
    }
    return parsed.data ?? null;
  }

  metrics(): SportsDataClientMetrics {
    return { ...this.counters };
  }

  private url(pathname: string, params: Record<string, string | number | undefined>): string {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) search.set(key, String(value));
    }
    const query = search.toString();
    return `${this.baseUrl}${pathname}${query ? `?${query}` : ''}`;
  }

  private async request(spec: RequestSpec): Promise<unknown> {
    const attempts = this.maxRetries + 1;
    let lastStatus: number | undefined;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      await this.throttle();
      this.counters.requests++;

      let response: HttpResponse;
      try {
        response = await this.fetchFn(spec.url, {
          method: spec.method,
          headers: this.headers(spec.body !== undefined),
          body: spec.body !== undefined ? JSON.stringify(spec.body) : undefined,
          signal: spec.signal,
        });
      } catch (error) {
        if (spec.signal?.aborted) throw error;
        lastError = error;
        lastStatus = undefined;
        this.logger.warn(`${spec.method} ${spec.label} transport error`, { attempt, error: errorMessage(error) });
        if (attempt < attempts) {
          await this.backoff(attempt);
          continue;
        }
        break;
      }

      const { status } = response;
      if (response.ok) {
        this.logger.debug(`${spec.method} ${spec.label}`, { status, attempt });
        try {
          return await response.json();
        } catch (error) {
          this.counters.failures++;
          throw new SportsDataError(
            'INVALID_RESPONSE',
            `Sports data API returned a body that is not JSON for ${spec.label}`,
            { status, cause: error }
          );
        }
      }

      if (status === 429) {
        this.counters.rateLimited++;
        this.counters.failures++;
        throw new RateLimitedError(spec.label, retryAfterMs(response.headers.get('retry-after'), this.now()));
      }
      if (status === 401 || status === 403) {
        this.counters.failures++;
        throw new UnauthorizedError(spec.label, status);
      }
      if (status === 404) {
        this.counters.failures++;
        throw new NotFoundError(spec.label);
      }
      if (status < 500) {
        this.counters.failures++;
        throw new SportsDataError('CLIENT_ERROR', `Sports data API rejected ${spec.label} (HTTP ${status})`, {
          status,
        });
      }

      lastStatus = status;
      lastError = undefined;
      this.logger.warn(`${spec.method} ${spec.label} server error`, { status, attempt });
      if (attempt < attempts) {
        await this.backoff(attempt);
      }
    }

    this.counters.failures++;
    throw new UpstreamError(spec.label, lastStatus, attempts, lastError);
  }

  private headers(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = { accept: 'application/json' };
    if (hasBody) headers['content-type'] = 'application/json';
    if (this.apiKey) headers.authorization = `Bearer ${this.apiKey}`;
    return headers;
  }

  /**
   * Wait for this request's slot. Slots are handed out in call order.
   */
  private throttle(): Promise<void> {
    const slot = this.queue.then(async () => {
      const wait = this.lastRequestAt + this.minDelayMs - this.now();
      if (wait > 0) await this.sleep(wait);
      this.lastRequestAt = this.now();
    });
    this.queue = slot;
    return slot;
  }

  private async backoff(attempt: number): Promise<void> {
    this.counters.retries++;
    await this.sleep(this.backoffBaseMs * 2 ** (attempt - 1));
  }
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, label: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new SportsDataError(
      'INVALID_RESPONSE',
      `Unexpected response shape from ${label}: ${parsed.error.issues
        .slice(0, 3)
        .map((i) => `${i.path.join('.') || '(root)'} ${i.message}`)
        .join('; ')}`
    );
  }
  return parsed.data;
}

/**
 * Retry-After in seconds (or an HTTP date) as milliseconds
 */
function retryAfterMs(header: string | null, now: number): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}
