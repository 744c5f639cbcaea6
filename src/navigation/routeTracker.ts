import { bearingDegrees, distanceMeters, pathLengthMeters, sameCoordinate } from './geo';
import { LatLng, RoutePlan, TrackingCursor } from './navTypes';
import { routeDestination } from './routePlan';

export const PEDESTRIAN_FALLBACK_SPEED_MPS = 5;
export const VEHICLE_FALLBACK_SPEED_MPS = (50 * 1000) / 3600;

export type RouteTrackerOptions = {
  fallbackSpeedMps?: number;
};

export type TrackingResult = {
  snappedPosition: LatLng;
  rawPosition: LatLng;
  snapDistanceMeters: number;
  lastIndex: number;
  advanced: boolean;
  remainingRoute: readonly LatLng[];
  // null when fewer than two points remain or the next point coincides with the snapped one
  bearing: number | null;
  distanceToDestination: number;
  estimatedTimeRemainingS: number;
};

const DEFAULTS: Required<RouteTrackerOptions> = {
  fallbackSpeedMps: PEDESTRIAN_FALLBACK_SPEED_MPS,
};

/**
 * Snaps a raw fix to the nearest route point at or after `cursor.lastIndex`.
 *
 * Earlier points are never scanned, so the cursor only moves forward even when a noisy fix
 * lands closer to a point already passed (loops, out-and-back routes). Mutates `cursor`.
 * An empty route returns the raw position untouched.
 */
export const snapToRoute = (raw: LatLng, cursor: TrackingCursor, route: RoutePlan): LatLng => {
  const points = route.points;
  if (!points.length) return raw;
  const start = Math.max(0, Math.min(cursor.lastIndex, points.length - 1));
  let minDistance = Infinity;
  let closestIndex = start;
  for (let i = start; i < points.length; i += 1) {
    const distance = distanceMeters(raw, points[i]);
    if (distance < minDistance) {
      minDistance = distance;
      closestIndex = i;
    }
  }
  if (closestIndex >= cursor.lastIndex) {
    cursor.lastIndex = closestIndex;
  }
  return points[closestIndex];
};

export const estimateTimeRemaining = (
  distance: number,
  speed: number | null | undefined,
  fallbackSpeedMps: number,
) => {
  const effective = typeof speed === 'number' && Number.isFinite(speed) && speed > 0 ? speed : fallbackSpeedMps;
  if (!(effective > 0) || !(distance > 0)) return 0;
  return Math.round(distance / effective);
};

export const createRouteTracker = (route: RoutePlan, options: RouteTrackerOptions = {}) => {
  const settings = {
    fallbackSpeedMps: options.fallbackSpeedMps ?? DEFAULTS.fallbackSpeedMps,
  };
  const destination = routeDestination(route);
  const cursor: TrackingCursor = { lastIndex: 0 };
  let remaining: readonly LatLng[] = Object.freeze(route.points.slice());

  const remainingDistance = (current: LatLng) => {
    if (!remaining.length) {
      return destination ? distanceMeters(current, destination) : 0;
    }
    return pathLengthMeters(remaining, current);
  };

  const bearingFrom = (snapped: LatLng) => {
    if (remaining.length < 2) return null;
    const next = remaining[1];
    if (sameCoordinate(snapped, next)) return null;
    return bearingDegrees(snapped, next);
  };

  const update = (raw: LatLng, speed?: number | null): TrackingResult => {
    const previousIndex = cursor.lastIndex;
    const snapped = snapToRoute(raw, cursor, route);
    const advanced = cursor.lastIndex !== previousIndex;
    if (advanced) {
      remaining = Object.freeze(route.points.slice(cursor.lastIndex));
    }
    const distanceToDestination = remainingDistance(snapped);
    return {
      snappedPosition: snapped,
      rawPosition: raw,
      snapDistanceMeters: distanceMeters(raw, snapped),
      lastIndex: cursor.lastIndex,
      advanced,
      remainingRoute: remaining,
      bearing: bearingFrom(snapped),
      distanceToDestination,
      estimatedTimeRemainingS: estimateTimeRemaining(distanceToDestination, speed, settings.fallbackSpeedMps),
    };
  };

  const reset = () => {
    cursor.lastIndex = 0;
    remaining = Object.freeze(route.points.slice());
  };

  return {
    update,
    reset,
    remainingDistance,
    getCursor: (): TrackingCursor => ({ lastIndex: cursor.lastIndex }),
    getRemainingRoute: () => remaining,
  };
};

export type RouteTracker = ReturnType<typeof createRouteTracker>;
