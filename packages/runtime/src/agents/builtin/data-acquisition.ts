// Data acquisition - games and team stats from the sports-data API

import type { Params } from '@huddle/protocol';
import { BaseAgent, numberParam, stringParam } from '../base-agent.js';
import type { AgentDefinition } from '../types.js';
import { ValidationError } from '../../errors.js';
import type { SportsDataClient } from '../../external/sports-data-client.js';

export const DATA_ACQUISITION_TYPE = 'data_acquisition';

export type SportsDataSource = Pick<SportsDataClient, 'getGames' | 'getTeamStats'>;

export class DataAcquisitionAgent extends BaseAgent {
  /**
   * Without a source both capabilities are registered as unavailable.
   */
  constructor(agentId: string, source?: SportsDataSource) {
    const availability = source
      ? { available: true }
      : { available: false, unavailableReason: 'no sports data API key configured' };

    super({
      agentType: DATA_ACQUISITION_TYPE,
      agentId,
      name: 'Data Acquisition',
      permissionLevel: 'read_execute',
      expertiseDomains: ['data_acquisition'],
      maxConcurrency: 2,
      capabilities: [
        {
          name: 'fetch_games',
          description: 'Fetch games for a season, week or team',
          requiredPermission: 'read_execute',
          executionTimeEstimateMs: 2500,
          toolsRequired: ['sports_data_api'],
          dataAccess: ['games'],
          domainTags: ['data_analysis'],
          ...availability,
          handler: async (params, ctx) => {
            const games = await requireSource(source).getGames(
              { season: seasonParam(params), week: optionalNumber(params, 'week'), team: optionalString(params, 'team') },
              ctx.signal
            );
            return { games, count: games.length, confidence: 0.95 };
          },
        },
        {
          name: 'fetch_team_stats',
          description: 'Fetch season stats for one or all teams',
          requiredPermission: 'read_execute',
          executionTimeEstimateMs: 2500,
          toolsRequired: ['sports_data_api'],
          dataAccess: ['team_stats'],
          domainTags: ['data_analysis'],
          ...availability,
          handler: async (params, ctx) => {
            const stats = await requireSource(source).getTeamStats(
              { season: seasonParam(params), team: optionalString(params, 'team') },
              ctx.signal
            );
            return { stats, count: stats.length, confidence: 0.95 };
          },
        },
      ],
    });
  }
}

function requireSource(source: SportsDataSource | undefined): SportsDataSource {
  if (!source) throw new ValidationError('sports data source is not configured');
  return source;
}

function seasonParam(params: Params): number {
  const season = numberParam(params, 'season', Number.NaN);
  if (!Number.isInteger(season)) {
    throw new ValidationError('"season" must be an integer year', { field: 'season' });
  }
  return season;
}

function optionalNumber(params: Params, key: string): number | undefined {
  const value = numberParam(params, key, Number.NaN);
  return Number.isNaN(value) ? undefined : value;
}

function optionalString(params: Params, key: string): string | undefined {
  return stringParam(params, key) || undefined;
}

export function createDataAcquisitionDefinition(options: { source?: SportsDataSource } = {}): AgentDefinition {
  return {
    description: 'Games and team stats from the sports-data API',
    factory: ({ agentId }) => new DataAcquisitionAgent(agentId, options.source),
  };
}
