export type LatLng = { latitude: number; longitude: number };

export type ManeuverStep = {
  instruction: string;
  location: LatLng;
  distanceMeters: number;
  type?: string;
  modifier?: string;
  roadName?: string;
  exit?: number;
};

export type RoutePlan = {
  readonly points: readonly LatLng[];
  readonly steps: readonly ManeuverStep[];
  readonly distanceMeters?: number;
  readonly durationSeconds?: number;
};

export type PositionFix = {
  latitude: number;
  longitude: number;
  // m/s, negative or missing when the source cannot tell
  speed?: number | null;
  heading?: number | null;
  accuracy?: number | null;
  timestamp: number;
};

export type TrackingCursor = { lastIndex: number };

export type SessionStatus = 'idle' | 'active';

export type SessionSnapshot = {
  status: SessionStatus;
  rawPosition: LatLng | null;
  snappedPosition: LatLng | null;
  snapDistanceMeters: number | null;
  bearingDegrees: number;
  distanceToDestinationMeters: number;
  estimatedTimeRemainingS: number;
  nextInstruction: string;
  currentStepIndex: number;
  lastIndex: number;
  navigationTrack: readonly LatLng[];
  remainingRoute: readonly LatLng[];
  updatedAt: number;
};
