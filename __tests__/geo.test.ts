import {
  bearingDegrees,
  buildCumulativeDistances,
  distanceMeters,
  findSegmentIndex,
  isValidCoordinate,
  pathLengthMeters,
} from '../src/navigation/geo';

const P0 = { latitude: 0, longitude: 0 };
const P1 = { latitude: 0, longitude: 0.001 };
const P2 = { latitude: 0, longitude: 0.002 };
const STEP_M = 111.19492664455875;

describe('geometry', () => {
  test('distance along the equator matches the arc length', () => {
    expect(distanceMeters(P0, P1)).toBeCloseTo(STEP_M, 6);
  });

  test('distance is symmetric and zero for identical points', () => {
    const a = { latitude: 48.8566, longitude: 2.3522 };
    const b = { latitude: 48.8606, longitude: 2.3376 };
    expect(distanceMeters(a, b)).toBeCloseTo(distanceMeters(b, a), 9);
    expect(distanceMeters(a, { ...a })).toBe(0);
  });

  test('antipodal points give half the circumference in both directions', () => {
    const halfCircumference = Math.PI * 6371000;
    const pairs = [
      [{ latitude: -0.82, longitude: 0 }, { latitude: 0.82, longitude: 180 }],
      [{ latitude: 0.82, longitude: 0 }, { latitude: -0.82, longitude: 180 }],
      [{ latitude: -0.74, longitude: 0 }, { latitude: 0.74, longitude: 180 }],
    ];
    for (const [a, b] of pairs) {
      expect(distanceMeters(a, b)).toBeCloseTo(halfCircumference, -1);
      expect(distanceMeters(a, b)).toBe(distanceMeters(b, a));
    }
    expect(Number.isFinite(distanceMeters({ latitude: -0.82, longitude: 0 }, { latitude: -0.82, longitude: 179.999999882 }))).toBe(
      true,
    );
  });

  test('bearing follows compass directions', () => {
    expect(bearingDegrees(P0, P1)).toBeCloseTo(90, 9);
    expect(bearingDegrees(P1, P0)).toBeCloseTo(270, 9);
    expect(bearingDegrees(P0, { latitude: 0.001, longitude: 0 })).toBe(0);
    expect(bearingDegrees({ latitude: 0.001, longitude: 0 }, P0)).toBeCloseTo(180, 9);
  });

  test('bearing between identical points is 0', () => {
    expect(bearingDegrees(P1, { ...P1 })).toBe(0);
  });

  test('path length sums consecutive segments', () => {
    expect(pathLengthMeters([P0, P1, P2])).toBeCloseTo(2 * STEP_M, 6);
    expect(pathLengthMeters([P1, P2], P0)).toBeCloseTo(2 * STEP_M, 6);
    expect(pathLengthMeters([])).toBe(0);
  });

  test('cumulative distances start at zero', () => {
    const cumDist = buildCumulativeDistances([P0, P1, P2]);
    expect(cumDist).toHaveLength(3);
    expect(cumDist[0]).toBe(0);
    expect(cumDist[2]).toBeCloseTo(2 * STEP_M, 6);
    expect(buildCumulativeDistances([P0])).toEqual([]);
  });

  test('segment lookup clamps to the last segment', () => {
    const cumDist = [0, 100, 200];
    expect(findSegmentIndex(cumDist, 50)).toBe(0);
    expect(findSegmentIndex(cumDist, 150)).toBe(1);
    expect(findSegmentIndex(cumDist, 500)).toBe(1);
  });

  test('validates coordinate ranges', () => {
    expect(isValidCoordinate({ latitude: 90, longitude: -180 })).toBe(true);
    expect(isValidCoordinate({ latitude: 91, longitude: 0 })).toBe(false);
    expect(isValidCoordinate({ latitude: 0, longitude: 180.5 })).toBe(false);
    expect(isValidCoordinate({ latitude: Number.NaN, longitude: 0 })).toBe(false);
  });
});
