import { isValidCoordinate } from './geo';
import { LatLng, ManeuverStep, RoutePlan } from './navTypes';

const NO_POINTS: LatLng[] = [];
const NO_STEPS: ManeuverStep[] = [];

export const EMPTY_ROUTE: RoutePlan = Object.freeze({
  points: Object.freeze(NO_POINTS),
  steps: Object.freeze(NO_STEPS),
});

export type RoutePlanInput = {
  points: readonly LatLng[];
  steps?: readonly ManeuverStep[];
  distanceMeters?: number;
  durationSeconds?: number;
};

const freezeCoord = (coord: LatLng): LatLng =>
  Object.freeze({ latitude: coord.latitude, longitude: coord.longitude });

// Copies and freezes the input; coordinates outside the valid range are dropped.
export const createRoutePlan = (input: RoutePlanInput): RoutePlan => {
  const points = input.points.filter(isValidCoordinate).map(freezeCoord);
  if (!points.length) return EMPTY_ROUTE;
  const steps = (input.steps || [])
    .filter((step) => isValidCoordinate(step.location))
    .map((step) => Object.freeze({ ...step, location: freezeCoord(step.location) }));
  return Object.freeze({
    points: Object.freeze(points),
    steps: Object.freeze(steps),
    distanceMeters: input.distanceMeters,
    durationSeconds: input.durationSeconds,
  });
};

export const isRouteEmpty = (route: RoutePlan) => route.points.length === 0;

export const routeDestination = (route: RoutePlan): LatLng | null =>
  route.points.length ? route.points[route.points.length - 1] : null;
