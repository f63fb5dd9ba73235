import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { silentLogger } from '../logger.js';
import {
  NotFoundError,
  RateLimitedError,
  SportsDataError,
  UnauthorizedError,
  UpstreamError,
} from '../errors.js';
import { SportsDataClient, type FetchFn, type HttpResponse } from './sports-data-client.js';

function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: (name) => headers[name.toLowerCase()] ?? null },
    json: async () => body,
  };
}

const game = {
  id: 401,
  season: 2024,
  week: 3,
  homeTeam: 'Ohio State',
  awayTeam: 'Western Michigan',
  homePoints: 56,
  awayPoints: 0,
};

describe('SportsDataClient', () => {
  let clock: number;
  let sleeps: number[];
  let fetchMock: Mock<FetchFn>;

  const createClient = (overrides: { maxRetries?: number; minDelayMs?: number } = {}) =>
    new SportsDataClient({
      baseUrl: 'https://sports.test/',
      graphqlUrl: 'https://sports.test/graphql',
      apiKey: 'test-key',
      fetch: fetchMock,
      sleep: async (ms) => {
        sleeps.push(ms);
        clock += ms;
      },
      now: () => clock,
      backoffBaseMs: 500,
      logger: silentLogger,
      ...overrides,
    });

  beforeEach(() => {
    clock = 0;
    sleeps = [];
    fetchMock = vi.fn<FetchFn>();
  });

  it('should fetch games with query parameters and the API key', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, [game]));
    const client = createClient();

    const games = await client.getGames({ season: 2024, week: 3 });

    expect(games).toEqual([game]);
    expect(fetchMock).toHaveBeenCalledWith('https://sports.test/games?year=2024&week=3', {
      method: 'GET',
      headers: { accept: 'application/json', authorization: 'Bearer test-key' },
      body: undefined,
      signal: undefined,
    });
  });

  it('should space requests by the minimum delay', async () => {
    fetchMock.mockResolvedValue(jsonResponse(200, []));
    const client = createClient({ minDelayMs: 100 });

    await Promise.all([client.getGames({ season: 2024 }), client.getTeamStats({ season: 2024, team: 'Army' })]);

    expect(sleeps).toEqual([100]);
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      'https://sports.test/games?year=2024',
      'https://sports.test/stats/season?year=2024&team=Army',
    ]);
  });

  it('should not retry a rate limit', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(429, {}, { 'retry-after': '2' }));
    const client = createClient();

    const error = await client.getGames({ season: 2024 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError && error.retryAfterMs).toBe(2000);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(client.metrics()).toEqual({ requests: 1, retries: 0, rateLimited: 1, failures: 1 });
  });

  it('should map auth and missing-resource statuses', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(401, {}))
      .mockResolvedValueOnce(jsonResponse(403, {}))
      .mockResolvedValueOnce(jsonResponse(404, {}));
    const client = createClient();

    await expect(client.getGames({ season: 2024 })).rejects.toThrow(UnauthorizedError);
    await expect(client.getGames({ season: 2024 })).rejects.toThrow(UnauthorizedError);
    await expect(client.getGames({ season: 2024 })).rejects.toThrow(NotFoundError);
  });

  it('should retry server errors with exponential backoff', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(503, {}))
      .mockResolvedValueOnce(jsonResponse(502, {}))
      .mockResolvedValueOnce(jsonResponse(200, [game]));
    const client = createClient();

    expect(await client.getGames({ season: 2024 })).toHaveLength(1);
    expect(sleeps).toEqual([500, 1000]);
    expect(client.metrics().retries).toBe(2);
  });

  it('should give up after the last retry', async () => {
    fetchMock.mockResolvedValue(jsonResponse(500, {}));
    const client = createClient({ maxRetries: 2 });

    const error = await client.getGames({ season: 2024 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error instanceof UpstreamError && error.attempts).toBe(3);
    expect(error instanceof UpstreamError && error.status).toBe(500);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should wrap transport failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const client = createClient({ maxRetries: 1 });

    const error = await client.getGames({ season: 2024 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error instanceof Error && error.cause).toBeInstanceOf(TypeError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should reject a response of the wrong shape', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, [{ id: 'not-a-number' }]));
    const client = createClient();

    const error = await client.getGames({ season: 2024 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SportsDataError);
    expect(error instanceof SportsDataError && error.code).toBe('INVALID_RESPONSE');
  });

  it('should wrap a success response whose body is not JSON', async () => {
    fetchMock.mockResolvedValueOnce({
      ...jsonResponse(200, null),
      json: async () => {
        throw new SyntaxError('Unexpected token < in JSON at position 0');
      },
    });
    const client = createClient();

    const error = await client.getGames({ season: 2024 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SportsDataError);
    expect(error instanceof SportsDataError && error.code).toBe('INVALID_RESPONSE');
    expect(error instanceof SportsDataError && error.status).toBe(200);
    expect(error instanceof Error && error.cause).toBeInstanceOf(SyntaxError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(client.metrics().failures).toBe(1);
  });

  describe('graphql', () => {
    it('should post the query and return data', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, { data: { teams: [] } }));
      const client = createClient();

      expect(await client.graphql('query { teams { school } }', { year: 2024 })).toEqual({ teams: [] });
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://sports.test/graphql');
      expect(init.method).toBe('POST');
      expect(init.headers['content-type']).toBe('application/json');
      expect(JSON.parse(init.body ?? '')).toEqual({ query: 'query { teams { school } }', variables: { year: 2024 } });
    });

    it('should surface GraphQL errors', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, { errors: [{ message: 'field "x" not found' }] }));
      const client = createClient();

      await expect(client.graphql('query { x }')).rejects.toThrow('GraphQL query failed: field "x" not found');
    });
  });
});
