import { z } from 'zod';
import { DEFAULT_STEP_ADVANCE_METERS } from './navigation/maneuverTracker';
import { PEDESTRIAN_FALLBACK_SPEED_MPS, VEHICLE_FALLBACK_SPEED_MPS } from './navigation/routeTracker';
import type { NavigationOptions } from './navigation/navigationSession';

export type TravelMode = 'pedestrian' | 'vehicle';

export const DEFAULT_MIN_MOVEMENT_METERS = 5;
export const DEFAULT_FIX_TIMEOUT_MS = 30000;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const optionalString = z
  .string()
  .trim()
  .transform((value) => value || undefined)
  .optional();

const envSchema = z.object({
  NAV_MIN_MOVEMENT_METERS: z.coerce.number().min(0).default(DEFAULT_MIN_MOVEMENT_METERS),
  NAV_TRAVEL_MODE: z.enum(['pedestrian', 'vehicle']).default('pedestrian'),
  NAV_FALLBACK_SPEED_MPS: z.coerce.number().positive().optional(),
  NAV_STEP_ADVANCE_METERS: z.coerce.number().positive().default(DEFAULT_STEP_ADVANCE_METERS),
  NAV_FIX_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FIX_TIMEOUT_MS),
  NAV_LOG_POSITIONS: booleanFlag.default('false'),
  ROUTER_URL: z.string().url().default('https://router.project-osrm.org'),
  ROUTER_PROFILE: z.string().min(1).default('driving'),
  ROUTER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  LOG_FILE: optionalString,
  SENTRY_DSN: optionalString,
  SENTRY_ENV: z.string().default('production'),
});

export type AppConfig = {
  minMovementMeters: number;
  travelMode: TravelMode;
  fallbackSpeedMps: number;
  stepAdvanceMeters: number;
  fixTimeoutMs: number;
  logPositions: boolean;
  routerUrl: string;
  routerProfile: string;
  routerTimeoutMs: number;
  logFile?: string;
  sentryDsn?: string;
  sentryEnv: string;
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export const fallbackSpeedForMode = (mode: TravelMode) =>
  mode === 'vehicle' ? VEHICLE_FALLBACK_SPEED_MPS : PEDESTRIAN_FALLBACK_SPEED_MPS;

// Empty strings count as unset so `FOO=` in a .env file falls back to the default.
const stripEmpty = (env: NodeJS.ProcessEnv) =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(stripEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const values = parsed.data;
  return {
    minMovementMeters: values.NAV_MIN_MOVEMENT_METERS,
    travelMode: values.NAV_TRAVEL_MODE,
    fallbackSpeedMps: values.NAV_FALLBACK_SPEED_MPS ?? fallbackSpeedForMode(values.NAV_TRAVEL_MODE),
    stepAdvanceMeters: values.NAV_STEP_ADVANCE_METERS,
    fixTimeoutMs: values.NAV_FIX_TIMEOUT_MS,
    logPositions: values.NAV_LOG_POSITIONS,
    routerUrl: values.ROUTER_URL.replace(/\/+$/, ''),
    routerProfile: values.ROUTER_PROFILE,
    routerTimeoutMs: values.ROUTER_TIMEOUT_MS,
    logFile: values.LOG_FILE,
    sentryDsn: values.SENTRY_DSN,
    sentryEnv: values.SENTRY_ENV,
  };
};

export const toNavigationOptions = (config: AppConfig): NavigationOptions => ({
  minMovementMeters: config.minMovementMeters,
  fallbackSpeedMps: config.fallbackSpeedMps,
  stepAdvanceMeters: config.stepAdvanceMeters,
  fixTimeoutMs: config.fixTimeoutMs,
  logPositions: config.logPositions,
});
