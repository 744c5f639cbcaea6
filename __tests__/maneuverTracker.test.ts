import { createManeuverTracker } from '../src/navigation/maneuverTracker';
import { ManeuverStep } from '../src/navigation/navTypes';

const P0 = { latitude: 0, longitude: 0 };
const P1 = { latitude: 0, longitude: 0.001 };
const P2 = { latitude: 0, longitude: 0.002 };

const step = (instruction: string, location: typeof P0, distanceMeters = 0): ManeuverStep => ({
  instruction,
  location,
  distanceMeters,
});

describe('maneuver tracker', () => {
  test('does not announce the step the traveler starts on', () => {
    const tracker = createManeuverTracker([step('start', P0), step('arrive', P2)]);
    const update = tracker.update(P0);
    expect(update.advanced).toBe(false);
    expect(update.stepIdx).toBe(0);
    expect(update.nextInstruction).toBe('');
  });

  test('advances to a later step within 30 m and never reverts', () => {
    const tracker = createManeuverTracker([step('start', P0), step('arrive', P2)]);
    const arrived = tracker.update({ latitude: 0.0001, longitude: 0.002 });
    expect(arrived.advanced).toBe(true);
    expect(arrived.stepIdx).toBe(1);
    expect(arrived.nextInstruction).toBe('arrive');

    const back = tracker.update(P0);
    expect(back.advanced).toBe(false);
    expect(back.stepIdx).toBe(1);
    expect(back.nextInstruction).toBe('arrive');
    expect(tracker.getStepIndex()).toBe(1);
  });

  test('stays put when the nearest later step is 30 m or more away', () => {
    const tracker = createManeuverTracker([step('start', P0), step('arrive', P2)]);
    // about 40 m short of P2
    const update = tracker.update({ latitude: 0, longitude: 0.00164 });
    expect(update.advanced).toBe(false);
    expect(update.nearestStepIdx).toBe(1);
    expect(update.nearestStepDistance).toBeCloseTo(40.03, 2);
    expect(update.nextInstruction).toBe('');
  });

  test('honours a custom advance radius', () => {
    const tracker = createManeuverTracker([step('start', P0), step('arrive', P2)], { advanceMeters: 50 });
    expect(tracker.update({ latitude: 0, longitude: 0.00164 }).stepIdx).toBe(1);
  });

  test('skips intermediate steps when jumping ahead', () => {
    const tracker = createManeuverTracker([step('depart', P0), step('turn left', P1), step('arrive', P2)]);
    const update = tracker.update(P2);
    expect(update.stepIdx).toBe(2);
    expect(update.nextInstruction).toBe('arrive');
  });

  test('reset clears the step and instruction', () => {
    const tracker = createManeuverTracker([step('start', P0), step('arrive', P2)]);
    tracker.update(P2);
    tracker.reset();
    expect(tracker.getStepIndex()).toBe(0);
    expect(tracker.getNextInstruction()).toBe('');
  });

  test('handles a route without steps', () => {
    const tracker = createManeuverTracker([]);
    const update = tracker.update(P1);
    expect(update.step).toBeNull();
    expect(update.stepIdx).toBe(0);
    expect(update.advanced).toBe(false);
  });
});
