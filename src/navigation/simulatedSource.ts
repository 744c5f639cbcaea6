import { bearingDegrees, buildCumulativeDistances, findSegmentIndex } from './geo';
import { LatLng, PositionFix } from './navTypes';
import { PositionSource } from './positionFeed';

export type SimulatedSourceOptions = {
  speedMps?: number;
  intervalMs?: number;
  now?: () => number;
};

/**
 * Walks the given polyline at a constant speed, emitting one fix per interval.
 * The first fix (route start) is emitted as soon as a watcher subscribes.
 */
export const createSimulatedPositionSource = (
  points: readonly LatLng[],
  options: SimulatedSourceOptions = {},
): PositionSource => {
  const speed = options.speedMps ?? 8;
  const intervalMs = options.intervalMs ?? 1000;
  const now = options.now ?? Date.now;
  const cumDist = buildCumulativeDistances(points);
  const total = cumDist.length ? cumDist[cumDist.length - 1] : 0;
  let simS = 0;
  let lastFix: PositionFix | null = null;

  const fixAt = (s: number): PositionFix => {
    if (points.length < 2 || total <= 0) {
      const only = points[0];
      return { latitude: only.latitude, longitude: only.longitude, speed: 0, timestamp: now() };
    }
    const idx = findSegmentIndex(cumDist, s);
    const start = points[idx];
    const end = points[idx + 1] || start;
    const segmentDistance = cumDist[idx + 1] - cumDist[idx] || 1;
    const t = Math.max(0, Math.min(1, (s - cumDist[idx]) / segmentDistance));
    return {
      latitude: start.latitude + (end.latitude - start.latitude) * t,
      longitude: start.longitude + (end.longitude - start.longitude) * t,
      speed,
      heading: bearingDegrees(start, end),
      timestamp: now(),
    };
  };

  const emitCurrent = (onFix: (fix: PositionFix) => void) => {
    lastFix = fixAt(simS);
    onFix(lastFix);
  };

  return {
    watchPosition: (onFix, onError) => {
      if (!points.length) {
        onError(new Error('Simulated route has no points'));
        return { remove: () => undefined };
      }
      simS = 0;
      let timer: ReturnType<typeof setInterval> | null = setInterval(() => {
        if (simS >= total) {
          if (timer) clearInterval(timer);
          timer = null;
          return;
        }
        simS = Math.min(simS + (speed * intervalMs) / 1000, total);
        emitCurrent(onFix);
      }, intervalMs);
      emitCurrent(onFix);
      return {
        remove: () => {
          if (timer) clearInterval(timer);
          timer = null;
        },
      };
    },
    getLastKnownPosition: async () => lastFix,
    getCurrentPosition: async () => {
      if (!points.length) throw new Error('Simulated route has no points');
      return fixAt(simS);
    },
  };
};
