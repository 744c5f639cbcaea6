import { createRoutePlan, EMPTY_ROUTE } from '../src/navigation/routePlan';
import {
  createRouteTracker,
  estimateTimeRemaining,
  snapToRoute,
  VEHICLE_FALLBACK_SPEED_MPS,
} from '../src/navigation/routeTracker';

const P0 = { latitude: 0, longitude: 0 };
const P1 = { latitude: 0, longitude: 0.001 };
const P2 = { latitude: 0, longitude: 0.002 };
const STEP_M = 111.19492664455875;

const straightRoute = createRoutePlan({ points: [P0, P1, P2] });

describe('snapToRoute', () => {
  test('returns the raw position when there is no route', () => {
    const raw = { latitude: 1, longitude: 1 };
    const cursor = { lastIndex: 0 };
    expect(snapToRoute(raw, cursor, EMPTY_ROUTE)).toBe(raw);
    expect(cursor.lastIndex).toBe(0);
  });

  test('snaps a fix on a route point to that point', () => {
    const cursor = { lastIndex: 0 };
    expect(snapToRoute({ ...P1 }, cursor, straightRoute)).toEqual(P1);
    expect(cursor.lastIndex).toBe(1);
  });

  test('snaps to the nearest point ahead of the cursor', () => {
    const cursor = { lastIndex: 0 };
    const snapped = snapToRoute({ latitude: 0.0001, longitude: 0.0018 }, cursor, straightRoute);
    expect(snapped).toEqual(P2);
    expect(cursor.lastIndex).toBe(2);
  });

  test('never snaps back to a point already passed', () => {
    const cursor = { lastIndex: 2 };
    expect(snapToRoute({ ...P0 }, cursor, straightRoute)).toEqual(P2);
    expect(cursor.lastIndex).toBe(2);
  });

  test('cursor is non-decreasing on a route that loops back on itself', () => {
    // out along the equator, up, and back over the start
    const loop = createRoutePlan({
      points: [
        { latitude: 0, longitude: 0 },
        { latitude: 0, longitude: 0.001 },
        { latitude: 0.001, longitude: 0.001 },
        { latitude: 0.001, longitude: 0 },
        { latitude: 0.00001, longitude: 0.00001 },
        { latitude: 0, longitude: -0.001 },
      ],
    });
    const fixes = [
      { latitude: 0, longitude: 0.0009 },
      { latitude: 0.0009, longitude: 0.001 },
      { latitude: 0.001, longitude: 0.0001 },
      { latitude: 0, longitude: 0 },
      { latitude: 0, longitude: 0.001 },
      { latitude: 0, longitude: -0.0009 },
    ];
    const cursor = { lastIndex: 0 };
    const seen: number[] = [];
    for (const fix of fixes) {
      snapToRoute(fix, cursor, loop);
      seen.push(cursor.lastIndex);
    }
    expect(seen).toEqual([1, 2, 3, 4, 4, 5]);
  });
});

describe('route tracker', () => {
  test('tracks remaining route, bearing and distance after a fix on P1', () => {
    const tracker = createRouteTracker(straightRoute);
    const result = tracker.update({ ...P1 }, 10);
    expect(result.snappedPosition).toEqual(P1);
    expect(result.lastIndex).toBe(1);
    expect(result.advanced).toBe(true);
    expect(result.remainingRoute).toEqual([P1, P2]);
    expect(result.bearing).toBeCloseTo(90, 9);
    expect(result.distanceToDestination).toBeCloseTo(STEP_M, 6);
    expect(result.snapDistanceMeters).toBe(0);
    expect(result.estimatedTimeRemainingS).toBe(11);
  });

  test('uses the fallback speed when the fix reports none', () => {
    const tracker = createRouteTracker(straightRoute, { fallbackSpeedMps: 5 });
    const result = tracker.update({ ...P0 }, null);
    expect(result.distanceToDestination).toBeCloseTo(2 * STEP_M, 6);
    expect(result.estimatedTimeRemainingS).toBe(44);
  });

  test('has no bearing once only the destination remains', () => {
    const tracker = createRouteTracker(straightRoute);
    const result = tracker.update({ ...P2 });
    expect(result.remainingRoute).toEqual([P2]);
    expect(result.bearing).toBeNull();
    expect(result.distanceToDestination).toBe(0);
    expect(result.estimatedTimeRemainingS).toBe(0);
  });

  test('reset rewinds the cursor and remaining route', () => {
    const tracker = createRouteTracker(straightRoute);
    tracker.update({ ...P2 });
    tracker.reset();
    expect(tracker.getCursor()).toEqual({ lastIndex: 0 });
    expect(tracker.getRemainingRoute()).toEqual([P0, P1, P2]);
  });

  test('an empty route yields the raw position and no distance', () => {
    const tracker = createRouteTracker(EMPTY_ROUTE);
    const raw = { latitude: 3, longitude: 4 };
    const result = tracker.update(raw);
    expect(result.snappedPosition).toBe(raw);
    expect(result.distanceToDestination).toBe(0);
    expect(result.bearing).toBeNull();
  });
});

describe('estimateTimeRemaining', () => {
  test('prefers a positive reported speed', () => {
    expect(estimateTimeRemaining(100, 20, 5)).toBe(5);
  });

  test('falls back when the speed is missing, zero or negative', () => {
    expect(estimateTimeRemaining(100, undefined, 5)).toBe(20);
    expect(estimateTimeRemaining(100, 0, 5)).toBe(20);
    expect(estimateTimeRemaining(100, -1, 5)).toBe(20);
  });

  test('vehicle fallback is 50 km/h', () => {
    expect(estimateTimeRemaining(1000, null, VEHICLE_FALLBACK_SPEED_MPS)).toBe(72);
  });

  test('no distance means no time', () => {
    expect(estimateTimeRemaining(0, 5, 5)).toBe(0);
  });
});
