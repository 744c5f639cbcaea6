import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { LatLng, ManeuverStep, RoutePlan } from '../navigation/navTypes';
import { createRoutePlan, EMPTY_ROUTE } from '../navigation/routePlan';
import { logInfo, logWarn } from './appLogger';
import { reportError } from './sentry';

export type RouteGeometries = 'geojson' | 'polyline' | 'polyline6';

export type RouteRequestOptions = {
  profile?: string;
  geometries?: RouteGeometries;
};

export type RoutingClientOptions = RouteRequestOptions & {
  baseUrl: string;
  timeoutMs?: number;
  http?: AxiosInstance;
};

// [lon, lat] with optional elevation
const position = z.tuple([z.number(), z.number()]).rest(z.number());

const maneuverSchema = z.object({
  type: z.string().optional(),
  modifier: z.string().optional(),
  instruction: z.string().optional(),
  location: position,
  exit: z.number().int().optional(),
});

const stepSchema = z.object({
  distance: z.number().nonnegative().optional(),
  duration: z.number().optional(),
  name: z.string().optional(),
  maneuver: maneuverSchema,
});

const routeSchema = z.object({
  geometry: z.union([
    z.string(),
    z.object({ type: z.literal('LineString'), coordinates: z.array(position) }),
  ]),
  legs: z.array(z.object({ steps: z.array(stepSchema).optional() })).optional(),
  distance: z.number().optional(),
  duration: z.number().optional(),
});

const responseSchema = z.object({
  code: z.string().optional(),
  routes: z.array(routeSchema).min(1),
});

type RouteStep = z.infer<typeof stepSchema>;

export const buildRoutePath = (origin: LatLng, destination: LatLng, options: RouteRequestOptions = {}) => {
  const profile = options.profile || 'driving';
  const coordinates = [origin, destination].map((p) => `${p.longitude},${p.latitude}`).join(';');
  const params = new URLSearchParams();
  params.set('overview', 'full');
  params.set('geometries', options.geometries || 'geojson');
  params.set('steps', 'true');
  return `/route/v1/${encodeURIComponent(profile)}/${coordinates}?${params.toString()}`;
};

export const buildRouteUrl = (
  origin: LatLng,
  destination: LatLng,
  options: RouteRequestOptions & { baseUrl: string },
) => `${options.baseUrl.replace(/\/+$/, '')}${buildRoutePath(origin, destination, options)}`;

/**
 * Turns a routing response into a RoutePlan. Anything unusable (bad shape, error code,
 * fewer than two valid points) becomes the empty route.
 */
export const parseRouteResponse = (json: unknown, options: RouteRequestOptions = {}): RoutePlan => {
  const parsed = responseSchema.safeParse(json);
  if (!parsed.success) {
    logWarn('ROUTE_RESPONSE_INVALID', { issues: parsed.error.issues.slice(0, 5).map((issue) => issue.message) });
    return EMPTY_ROUTE;
  }
  if (parsed.data.code && parsed.data.code !== 'Ok') {
    logWarn('ROUTE_RESPONSE_ERROR', { code: parsed.data.code });
    return EMPTY_ROUTE;
  }
  const route = parsed.data.routes[0];
  const points =
    typeof route.geometry === 'string'
      ? decodePolyline(route.geometry, options.geometries === 'polyline6' ? 6 : 5)
      : route.geometry.coordinates.map(([longitude, latitude]) => ({ latitude, longitude }));
  const steps = (route.legs || []).flatMap((leg) => (leg.steps || []).map(buildManeuverStep));
  const plan = createRoutePlan({
    points,
    steps,
    distanceMeters: route.distance,
    durationSeconds: route.duration,
  });
  return plan.points.length < 2 ? EMPTY_ROUTE : plan;
};

const buildManeuverStep = (step: RouteStep): ManeuverStep => {
  const [longitude, latitude] = step.maneuver.location;
  return {
    instruction: buildInstruction(step),
    location: { latitude, longitude },
    distanceMeters: step.distance ?? 0,
    type: step.maneuver.type,
    modifier: step.maneuver.modifier,
    roadName: step.name || undefined,
    exit: step.maneuver.exit,
  };
};

const buildInstruction = (step: RouteStep) => {
  const given = step.maneuver.instruction?.trim();
  if (given) return given;
  const type = step.maneuver.type || '';
  const modifier = step.maneuver.modifier || '';
  const road = step.name || '';
  const roadSuffix = road ? ` onto ${road}` : '';
  if (type === 'arrive') return 'You have arrived at your destination';
  if (type === 'depart') return road ? `Head ${modifier || 'straight'} on ${road}` : 'Head straight';
  if (type === 'roundabout' || type === 'rotary') {
    if (step.maneuver.exit) return `Take the ${formatOrdinal(step.maneuver.exit)} exit at the roundabout${roadSuffix}`;
    return `At the roundabout, continue${roadSuffix}`;
  }
  if (modifier === 'uturn') return `Make a U-turn${roadSuffix}`;
  if (modifier === 'straight') return road ? `Continue straight onto ${road}` : 'Continue straight';
  if (modifier) return road ? `Turn ${modifier} onto ${road}` : `Turn ${modifier}`;
  if (road) return `Continue on ${road}`;
  return 'Continue';
};

const formatOrdinal = (n: number) => {
  const mod10 = n % 10;
  const mod100 = n % 100;
  if (mod10 === 1 && mod100 !== 11) return `${n}st`;
  if (mod10 === 2 && mod100 !== 12) return `${n}nd`;
  if (mod10 === 3 && mod100 !== 13) return `${n}rd`;
  return `${n}th`;
};

export const decodePolyline = (t: string, precision = 5): LatLng[] => {
  if (!t) return [];
  const factor = Math.pow(10, precision);
  const points: LatLng[] = [];
  let index = 0;
  let lat = 0;
  let lng = 0;
  const readValue = () => {
    let b: number;
    let shift = 0;
    let result = 0;
    do {
      b = t.charCodeAt(index++) - 63;
      result |= (b & 0x1f) << shift;
      shift += 5;
    } while (b >= 0x20 && index < t.length);
    return result & 1 ? ~(result >> 1) : result >> 1;
  };
  while (index < t.length) {
    lat += readValue();
    if (index >= t.length) break;
    lng += readValue();
    points.push({ latitude: lat / factor, longitude: lng / factor });
  }
  return points;
};

export const createRoutingClient = (options: RoutingClientOptions) => {
  const http =
    options.http ||
    axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 10000,
      headers: { Accept: 'application/json' },
    });

  // Never throws: failures are logged and reported, and yield the empty route.
  const fetchRoutePlan = async (origin: LatLng, destination: LatLng): Promise<RoutePlan> => {
    const path = buildRoutePath(origin, destination, options);
    try {
      const res = await http.get<unknown>(path);
      const plan = parseRouteResponse(res.data, options);
      logInfo('ROUTE_FETCHED', { points: plan.points.length, steps: plan.steps.length });
      return plan;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      const message = error instanceof Error ? error.message : String(error);
      logWarn('ROUTE_FETCH_FAILED', { path, status, message });
      reportError(error, { path, status });
      return EMPTY_ROUTE;
    }
  };

  return { fetchRoutePlan };
};

export type RoutingClient = ReturnType<typeof createRoutingClient>;
