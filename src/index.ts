export * from './navigation/navTypes';
export {
  bearingDegrees,
  buildCumulativeDistances,
  distanceMeters,
  isValidCoordinate,
  pathLengthMeters,
} from './navigation/geo';
export { createRoutePlan, EMPTY_ROUTE, isRouteEmpty, routeDestination } from './navigation/routePlan';
export type { RoutePlanInput } from './navigation/routePlan';
export {
  createRouteTracker,
  estimateTimeRemaining,
  PEDESTRIAN_FALLBACK_SPEED_MPS,
  snapToRoute,
  VEHICLE_FALLBACK_SPEED_MPS,
} from './navigation/routeTracker';
export type { RouteTracker, TrackingResult } from './navigation/routeTracker';
export { createManeuverTracker, DEFAULT_STEP_ADVANCE_METERS } from './navigation/maneuverTracker';
export type { ManeuverTracker, ManeuverUpdate } from './navigation/maneuverTracker';
export { isNavigationError, NavigationError } from './navigation/errors';
export type { NavigationErrorCode } from './navigation/errors';
export { createNavigationSession } from './navigation/navigationSession';
export type { NavigationOptions, NavigationSession, NoticeListener, SnapshotListener } from './navigation/navigationSession';
export { createPositionFeed } from './navigation/positionFeed';
export type { PositionFeed, PositionSource, PositionSubscription } from './navigation/positionFeed';
export { createSimulatedPositionSource } from './navigation/simulatedSource';
export { formatDistance, formatDuration, formatInstruction } from './navigation/units';
export { buildRouteUrl, createRoutingClient, decodePolyline, parseRouteResponse } from './lib/routing';
export type { RoutingClient, RoutingClientOptions } from './lib/routing';
export { ConfigError, loadConfig, toNavigationOptions } from './config';
export type { AppConfig, TravelMode } from './config';
export { flushLogs, initAppLogger } from './lib/appLogger';
export { initSentry, isSentryEnabled, reportError } from './lib/sentry';
