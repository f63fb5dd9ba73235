export { LoadTracker } from './load-tracker.js';
export {
  RequestRouter,
  type RouteQuery,
  type RouteCandidate,
  type RouteDecision,
  type Reservation,
  type RequestRouterOptions,
} from './request-router.js';
