import { LatLng } from './navTypes';

const EARTH_RADIUS_M = 6371000;

const toRad = (deg: number) => (deg * Math.PI) / 180;

export const isValidCoordinate = (coord: LatLng) =>
  Number.isFinite(coord.latitude) &&
  Number.isFinite(coord.longitude) &&
  Math.abs(coord.latitude) <= 90 &&
  Math.abs(coord.longitude) <= 180;

export const sameCoordinate = (a: LatLng, b: LatLng) =>
  a.latitude === b.latitude && a.longitude === b.longitude;

// Haversine on a spherical earth.
export const distanceMeters = (a: LatLng, b: LatLng) => {
  if (sameCoordinate(a, b)) return 0;
  const dLat = toRad(b.latitude - a.latitude);
  const dLon = toRad(b.longitude - a.longitude);
  const lat1 = toRad(a.latitude);
  const lat2 = toRad(b.latitude);
  const sinDLat = Math.sin(dLat / 2);
  const sinDLon = Math.sin(dLon / 2);
  // rounding can push h past 1 for near-antipodal points
  const h = Math.min(1, sinDLat * sinDLat + Math.cos(lat1) * Math.cos(lat2) * sinDLon * sinDLon);
  return 2 * EARTH_RADIUS_M * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
};

/**
 * Initial compass bearing from `a` to `b`, in [0, 360).
 * Identical points have no direction and yield 0.
 */
export const bearingDegrees = (a: LatLng, b: LatLng) => {
  if (sameCoordinate(a, b)) return 0;
  const dLon = toRad(b.longitude - a.longitude);
  const y = Math.sin(dLon) * Math.cos(toRad(b.latitude));
  const x =
    Math.cos(toRad(a.latitude)) * Math.sin(toRad(b.latitude)) -
    Math.sin(toRad(a.latitude)) * Math.cos(toRad(b.latitude)) * Math.cos(dLon);
  const brng = (Math.atan2(y, x) * 180) / Math.PI;
  const normalized = (brng + 360) % 360;
  return normalized >= 360 ? 0 : normalized;
};

export const pathLengthMeters = (coords: readonly LatLng[], from?: LatLng) => {
  let total = 0;
  let previous = from ?? coords[0];
  for (const point of coords) {
    if (previous) total += distanceMeters(previous, point);
    previous = point;
  }
  return total;
};

export const buildCumulativeDistances = (coords: readonly LatLng[]) => {
  if (coords.length < 2) return [];
  const distances = [0];
  let total = 0;
  for (let i = 1; i < coords.length; i += 1) {
    total += distanceMeters(coords[i - 1], coords[i]);
    distances.push(total);
  }
  return distances;
};

export const findSegmentIndex = (cumDist: readonly number[], distance: number) => {
  let low = 0;
  let high = cumDist.length - 1;
  while (low <= high) {
    const mid = Math.floor((low + high) / 2);
    if (cumDist[mid] <= distance) {
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }
  return Math.max(0, Math.min(cumDist.length - 2, high));
};
