import { distanceMeters } from './geo';
import { LatLng, ManeuverStep } from './navTypes';

export type ManeuverUpdate = {
  stepIdx: number;
  step: ManeuverStep | null;
  advanced: boolean;
  nextInstruction: string;
  nearestStepIdx: number | null;
  nearestStepDistance: number | null;
};

export type ManeuverTrackerOptions = {
  advanceMeters?: number;
};

export const DEFAULT_STEP_ADVANCE_METERS = 30;

/**
 * Forward-only maneuver tracking. Only steps at or after the current one are considered, and
 * the current step moves only to a strictly later step whose anchor is within `advanceMeters`.
 * Lingering near a maneuver point therefore never re-announces it.
 */
export const createManeuverTracker = (
  steps: readonly ManeuverStep[],
  options: ManeuverTrackerOptions = {},
) => {
  const settings = {
    advanceMeters: options.advanceMeters ?? DEFAULT_STEP_ADVANCE_METERS,
  };

  let stepIdx = 0;
  let nextInstruction = '';

  const reset = () => {
    stepIdx = 0;
    nextInstruction = '';
  };

  const update = (position: LatLng): ManeuverUpdate => {
    if (!steps.length) {
      return {
        stepIdx: 0,
        step: null,
        advanced: false,
        nextInstruction,
        nearestStepIdx: null,
        nearestStepDistance: null,
      };
    }

    let minDistance = Infinity;
    let nearestIdx = stepIdx;
    for (let i = stepIdx; i < steps.length; i += 1) {
      const distance = distanceMeters(position, steps[i].location);
      if (distance < minDistance) {
        minDistance = distance;
        nearestIdx = i;
      }
    }

    const advanced = minDistance < settings.advanceMeters && nearestIdx > stepIdx;
    if (advanced) {
      stepIdx = nearestIdx;
      nextInstruction = steps[stepIdx].instruction;
    }

    return {
      stepIdx,
      step: steps[stepIdx],
      advanced,
      nextInstruction,
      nearestStepIdx: nearestIdx,
      nearestStepDistance: minDistance,
    };
  };

  return {
    update,
    reset,
    getStepIndex: () => stepIdx,
    getNextInstruction: () => nextInstruction,
  };
};

export type ManeuverTracker = ReturnType<typeof createManeuverTracker>;
