import { SessionSnapshot } from './navTypes';

export type DistanceUnits = 'metric' | 'imperial';

const METERS_PER_MILE = 1609.344;
const YARDS_PER_METER = 1.09361;

const formatImperial = (meters: number) => {
  const milesThreshold = 0.2 * METERS_PER_MILE;
  if (meters >= milesThreshold) {
    const miles = meters / METERS_PER_MILE;
    return `${miles.toFixed(1)} mi`;
  }
  const yards = meters * YARDS_PER_METER;
  if (yards < 20) {
    return `${Math.max(1, Math.round(yards))} yd`;
  }
  const rounded = Math.round(yards / 10) * 10;
  return `${Math.max(20, rounded)} yd`;
};

export const formatDistance = (meters: number, units: DistanceUnits = 'metric') => {
  if (!Number.isFinite(meters)) return '';
  const value = Math.max(0, meters);
  if (units === 'imperial') return formatImperial(value);
  if (value >= 1000) return `${(value / 1000).toFixed(1)} km`;
  return `${value.toFixed(0)} m`;
};

// Whole minutes, truncated.
export const formatDuration = (seconds: number) => {
  if (!Number.isFinite(seconds)) return '';
  return `${Math.floor(Math.max(0, seconds) / 60)} min`;
};

export const formatInstruction = (snapshot: Pick<SessionSnapshot, 'nextInstruction'>) =>
  snapshot.nextInstruction || 'Follow the route';
