import { logError, logInfo, logWarn } from '../lib/appLogger';
import { reportError } from '../lib/sentry';
import { DEFAULT_MIN_MOVEMENT_METERS, DEFAULT_FIX_TIMEOUT_MS } from '../config';
import { NavigationError } from './errors';
import { distanceMeters, isValidCoordinate, pathLengthMeters } from './geo';
import { createManeuverTracker, DEFAULT_STEP_ADVANCE_METERS, ManeuverTracker } from './maneuverTracker';
import { LatLng, RoutePlan, SessionSnapshot } from './navTypes';
import { createPositionFeed, PositionFeed, PositionSource } from './positionFeed';
import { createRouteTracker, estimateTimeRemaining, PEDESTRIAN_FALLBACK_SPEED_MPS, RouteTracker } from './routeTracker';

export type NavigationOptions = {
  minMovementMeters?: number;
  fallbackSpeedMps?: number;
  stepAdvanceMeters?: number;
  fixTimeoutMs?: number;
  logPositions?: boolean;
  now?: () => number;
};

export type SnapshotListener = (snapshot: SessionSnapshot) => void;
export type NoticeListener = (notice: NavigationError) => void;

type ActiveSession = {
  route: RoutePlan;
  tracker: RouteTracker;
  maneuvers: ManeuverTracker;
  feed: PositionFeed | null;
  lastAcceptedRaw: LatLng | null;
};

const NO_COORDS: LatLng[] = [];

const idleSnapshot = (updatedAt: number): SessionSnapshot => {
  const idle: SessionSnapshot = {
    status: 'idle',
    rawPosition: null,
    snappedPosition: null,
    snapDistanceMeters: null,
    bearingDegrees: 0,
    distanceToDestinationMeters: 0,
    estimatedTimeRemainingS: 0,
    nextInstruction: '',
    currentStepIndex: 0,
    lastIndex: 0,
    navigationTrack: Object.freeze(NO_COORDS),
    remainingRoute: Object.freeze(NO_COORDS),
    updatedAt,
  };
  return Object.freeze(idle);
};

const toLatLng = (position: LatLng): LatLng =>
  Object.freeze({ latitude: position.latitude, longitude: position.longitude });

/**
 * Idle/active state machine driving one traveler along one RoutePlan at a time.
 *
 * Updates must arrive one at a time; `onPositionUpdate` is synchronous and never interleaves
 * with itself. Every accepted update produces a new frozen snapshot for subscribers.
 */
export const createNavigationSession = (options: NavigationOptions = {}) => {
  const settings = {
    minMovementMeters: options.minMovementMeters ?? DEFAULT_MIN_MOVEMENT_METERS,
    fallbackSpeedMps: options.fallbackSpeedMps ?? PEDESTRIAN_FALLBACK_SPEED_MPS,
    stepAdvanceMeters: options.stepAdvanceMeters ?? DEFAULT_STEP_ADVANCE_METERS,
    fixTimeoutMs: options.fixTimeoutMs ?? DEFAULT_FIX_TIMEOUT_MS,
    logPositions: options.logPositions ?? false,
    now: options.now ?? Date.now,
  };

  let route: RoutePlan | null = null;
  let active: ActiveSession | null = null;
  let track: LatLng[] = [];
  let snapshot = idleSnapshot(settings.now());
  const listeners = new Set<SnapshotListener>();
  const noticeListeners = new Set<NoticeListener>();

  const emit = () => {
    for (const listener of [...listeners]) {
      try {
        listener(snapshot);
      } catch (error) {
        logError('NAV_LISTENER_FAILED', error);
        reportError(error, { listener: 'snapshot' });
      }
    }
  };

  const notify = (notice: NavigationError) => {
    reportError(notice, { code: notice.code, ...notice.details });
    for (const listener of [...noticeListeners]) {
      try {
        listener(notice);
      } catch (error) {
        logError('NAV_NOTICE_LISTENER_FAILED', error);
        reportError(error, { listener: 'notice' });
      }
    }
  };

  const start = (plan: RoutePlan, source?: PositionSource): SessionSnapshot => {
    if (!plan.points.length) {
      throw new NavigationError('no_route', 'Cannot start navigation without route points');
    }
    if (active) {
      if (active.route === plan) return snapshot;
      throw new NavigationError('invalid_state', 'Navigation is already active for another route; stop it first');
    }

    route = plan;
    track = [];
    const session: ActiveSession = {
      route: plan,
      tracker: createRouteTracker(plan, { fallbackSpeedMps: settings.fallbackSpeedMps }),
      maneuvers: createManeuverTracker(plan.steps, { advanceMeters: settings.stepAdvanceMeters }),
      feed: null,
      lastAcceptedRaw: null,
    };
    active = session;

    const totalDistance = pathLengthMeters(plan.points);
    const initial: SessionSnapshot = {
      ...idleSnapshot(settings.now()),
      status: 'active',
      distanceToDestinationMeters: totalDistance,
      estimatedTimeRemainingS: estimateTimeRemaining(totalDistance, null, settings.fallbackSpeedMps),
      remainingRoute: session.tracker.getRemainingRoute(),
    };
    snapshot = Object.freeze(initial);
    logInfo('NAV_START', { points: plan.points.length, steps: plan.steps.length, distance: totalDistance });
    emit();

    if (source) {
      const feed = createPositionFeed(
        source,
        {
          onFix: (fix) => {
            onPositionUpdate(fix, fix.speed);
          },
          onUnavailable: notify,
        },
        { fixTimeoutMs: settings.fixTimeoutMs },
      );
      session.feed = feed;
      try {
        feed.start();
      } catch (error) {
        logError('NAV_FEED_START_FAILED', error);
        stop();
        throw error;
      }
    }
    return snapshot;
  };

  /**
   * Feeds one raw fix. Returns false when the fix was ignored: session idle, invalid
   * coordinate, or closer than `minMovementMeters` to the last accepted fix.
   */
  const onPositionUpdate = (raw: LatLng, reportedSpeed?: number | null): boolean => {
    const session = active;
    if (!session) return false;
    if (!isValidCoordinate(raw)) {
      logWarn('POSITION_INVALID', { latitude: raw.latitude, longitude: raw.longitude });
      return false;
    }
    if (
      session.lastAcceptedRaw &&
      distanceMeters(session.lastAcceptedRaw, raw) < settings.minMovementMeters
    ) {
      return false;
    }

    const position = toLatLng(raw);
    session.lastAcceptedRaw = position;
    const result = session.tracker.update(position, reportedSpeed);
    track.push(result.snappedPosition);
    const maneuver = session.maneuvers.update(result.snappedPosition);
    if (maneuver.advanced) {
      logInfo('NAV_STEP', { stepIdx: maneuver.stepIdx, instruction: maneuver.nextInstruction });
    }

    const next: SessionSnapshot = {
      status: 'active',
      rawPosition: position,
      snappedPosition: result.snappedPosition,
      snapDistanceMeters: result.snapDistanceMeters,
      bearingDegrees: result.bearing ?? snapshot.bearingDegrees,
      distanceToDestinationMeters: result.distanceToDestination,
      estimatedTimeRemainingS: result.estimatedTimeRemainingS,
      nextInstruction: maneuver.nextInstruction,
      currentStepIndex: maneuver.stepIdx,
      lastIndex: result.lastIndex,
      // copied per accepted fix so earlier snapshots keep their own track; linear in track length
      navigationTrack: Object.freeze(track.slice()),
      remainingRoute: result.remainingRoute,
      updatedAt: settings.now(),
    };
    snapshot = Object.freeze(next);

    if (settings.logPositions) {
      logInfo('NAV_POSITION', {
        raw: position,
        snapped: result.snappedPosition,
        speed: reportedSpeed ?? null,
        distance: Math.round(result.distanceToDestination),
        eta: result.estimatedTimeRemainingS,
        bearing: snapshot.bearingDegrees,
      });
    }
    emit();
    return true;
  };

  const stop = (): SessionSnapshot => {
    const session = active;
    if (!session) return snapshot;
    active = null;
    session.feed?.stop();
    session.tracker.reset();
    session.maneuvers.reset();
    track = [];
    snapshot = idleSnapshot(settings.now());
    logInfo('NAV_STOP', { points: session.route.points.length });
    emit();
    return snapshot;
  };

  const clearRoute = () => {
    stop();
    route = null;
  };

  const subscribe = (listener: SnapshotListener) => {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  const onNotice = (listener: NoticeListener) => {
    noticeListeners.add(listener);
    return () => {
      noticeListeners.delete(listener);
    };
  };

  const dispose = () => {
    stop();
    listeners.clear();
    noticeListeners.clear();
  };

  return {
    start,
    stop,
    onPositionUpdate,
    clearRoute,
    subscribe,
    onNotice,
    dispose,
    getSnapshot: () => snapshot,
    getRoute: () => route,
    isActive: () => active !== null,
  };
};

export type NavigationSession = ReturnType<typeof createNavigationSession>;
