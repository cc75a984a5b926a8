import { describe, it, expect } from 'vitest';
import {
  haversineDistance,
  sampleDistance,
  calculatePace,
  calculateSpeed,
  routeDistance
} from './geo-math';

describe('haversineDistance', () => {
  it('returns 0 for same point', () => {
    expect(haversineDistance(48.8566, 2.3522, 48.8566, 2.3522)).toBe(0);
  });

  it('calculates known distance Paris to Lyon (~392 km)', () => {
    const d = haversineDistance(48.8566, 2.3522, 45.7640, 4.8357);
    expect(d).toBeGreaterThan(390000);
    expect(d).toBeLessThan(395000);
  });

  it('calculates ~111.19 m for 0.001 deg of latitude', () => {
    expect(haversineDistance(0, 0, 0.001, 0)).toBeCloseTo(111.195, 2);
  });

  it('is symmetric', () => {
    const ab = haversineDistance(48.8566, 2.3522, 45.7640, 4.8357);
    const ba = haversineDistance(45.7640, 4.8357, 48.8566, 2.3522);
    expect(ab).toBeCloseTo(ba, 6);
  });
});

describe('sampleDistance', () => {
  it('matches haversineDistance on the same coordinates', () => {
    const a = { latitude: 37.7749, longitude: -122.4194 };
    const b = { latitude: 37.7759, longitude: -122.4184 };
    expect(sampleDistance(a, b)).toBe(haversineDistance(37.7749, -122.4194, 37.7759, -122.4184));
  });
});

describe('calculatePace', () => {
  it('returns pace in sec/km', () => {
    // 1000m in 300s => 5:00/km
    expect(calculatePace(1000, 300)).toBe(300);
  });

  it('returns null for zero distance', () => {
    expect(calculatePace(0, 300)).toBeNull();
  });

  it('handles fractional distances', () => {
    expect(calculatePace(500, 150)).toBe(300);
  });
});

describe('calculateSpeed', () => {
  it('returns meters per second', () => {
    expect(calculateSpeed(100, 50)).toBe(2);
  });

  it('returns null before any time has elapsed', () => {
    expect(calculateSpeed(100, 0)).toBeNull();
  });
});

describe('routeDistance', () => {
  it('returns 0 for empty or single point', () => {
    expect(routeDistance([])).toBe(0);
    expect(routeDistance([{ latitude: 0, longitude: 0 }])).toBe(0);
  });

  it('sums distances between consecutive points', () => {
    const points = [
      { latitude: 0, longitude: 0 },
      { latitude: 0.001, longitude: 0 },
      { latitude: 0.002, longitude: 0 },
    ];
    const singleLeg = haversineDistance(0, 0, 0.001, 0);
    expect(routeDistance(points)).toBeCloseTo(singleLeg * 2, 6);
  });
});
