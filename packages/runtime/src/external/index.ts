export {
  loadModels,
  toFeatureVector,
  createWeightedModel,
  createJsonModelLoader,
  modelFileSchema,
  type Prediction,
  type PredictionModel,
  type ModelLoader,
  type ModelLoadFailure,
  type LoadedModels,
  type ModelFile,
} from './prediction.js';
export {
  SportsDataClient,
  gameSchema,
  teamStatSchema,
  DEFAULT_GRAPHQL_URL,
  DEFAULT_MAX_REQUESTS_PER_SECOND,
  DEFAULT_MAX_RETRIES,
  DEFAULT_BACKOFF_BASE_MS,
  type SportsDataClientOptions,
  type SportsDataClientMetrics,
  type FetchFn,
  type HttpResponse,
  type HttpRequestInit,
  type Game,
  type TeamStat,
  type GamesQuery,
  type TeamStatsQuery,
} from './sports-data-client.js';
