import { describe, it, expect, beforeEach } from 'vitest';
import { RouteAccumulator } from './route-accumulator';
import { haversineDistance } from './geo-math';
import { makeSample, STEP_DEG } from '@/testing/fixtures';

const STEP_METERS = haversineDistance(0, 0, STEP_DEG, 0);

describe('RouteAccumulator', () => {
  let acc: RouteAccumulator;

  beforeEach(() => {
    acc = new RouteAccumulator();
  });

  it('starts empty', () => {
    expect(acc.distanceMeters).toBe(0);
    expect(acc.routeLength).toBe(0);
    expect(acc.lastAccepted).toBeNull();
  });

  it('credits no distance for the first fix', () => {
    const result = acc.ingest(makeSample(0, 0, 0));
    expect(result.increment).toBe(0);
    expect(acc.routeLength).toBe(1);
  });

  it('accumulates distance between accepted fixes', () => {
    acc.ingest(makeSample(0, 0, 0));
    const result = acc.ingest(makeSample(STEP_DEG, 0, 4000));

    expect(result.increment).toBeCloseTo(STEP_METERS, 9);
    expect(acc.distanceMeters).toBeCloseTo(STEP_METERS, 9);
    expect(acc.getRoute()).toEqual([
      { latitude: 0, longitude: 0 },
      { latitude: STEP_DEG, longitude: 0 },
    ]);
  });

  it('accumulates a fix fed twice only once', () => {
    acc.ingest(makeSample(0, 0, 0));
    acc.ingest(makeSample(STEP_DEG, 0, 4000));
    const again = acc.ingest(makeSample(STEP_DEG, 0, 4000));

    expect(again.decision.reason).toBe('jitter');
    expect(acc.distanceMeters).toBeCloseTo(STEP_METERS, 9);
    expect(acc.routeLength).toBe(2);
  });

  it('ignores inaccurate fixes entirely', () => {
    acc.ingest(makeSample(0, 0, 0));
    acc.ingest(makeSample(STEP_DEG, 0, 4000, 50));

    expect(acc.distanceMeters).toBe(0);
    expect(acc.routeLength).toBe(1);
    expect(acc.lastAccepted?.timestamp).toBe(0);
  });

  it('discards glitch-sized increments but moves the reference point', () => {
    acc.ingest(makeSample(0, 0, 0));
    acc.ingest(makeSample(STEP_DEG, 0, 4000));
    // ~111 m jump: accepted, but the increment is discarded
    const jump = acc.ingest(makeSample(11 * STEP_DEG, 0, 44000));
    expect(jump.decision.accepted).toBe(true);
    expect(jump.increment).toBe(0);
    expect(acc.distanceMeters).toBeCloseTo(STEP_METERS, 9);

    // The next step is measured from the jumped-to fix
    acc.ingest(makeSample(12 * STEP_DEG, 0, 48000));
    expect(acc.distanceMeters).toBeCloseTo(2 * STEP_METERS, 6);
  });

  it('never decreases distance across a noisy stream', () => {
    const stream = [
      makeSample(0, 0, 0),
      makeSample(0.00001, 0, 1000),          // jitter
      makeSample(STEP_DEG, 0, 4000),
      makeSample(2 * STEP_DEG, 0, 8000, 40), // inaccurate
      makeSample(2 * STEP_DEG, 0, 8000),
      makeSample(30 * STEP_DEG, 0, 9000),    // glitch
      makeSample(31 * STEP_DEG, 0, 13000),
    ];

    let last = 0;
    for (const sample of stream) {
      acc.ingest(sample);
      expect(acc.distanceMeters).toBeGreaterThanOrEqual(last);
      last = acc.distanceMeters;
    }
    expect(acc.distanceMeters).toBeCloseTo(3 * STEP_METERS, 6);
  });

  it('keeps fixes that fail route inclusion off the route', () => {
    acc.ingest(makeSample(0, 0, 0));
    acc.ingest(makeSample(STEP_DEG, 0, 4000));
    // ~11 m in 0.5 s: counted toward distance, left off the route
    const result = acc.ingest(makeSample(2 * STEP_DEG, 0, 4500));

    expect(result.decision.reason).toBe('route-speed');
    expect(acc.distanceMeters).toBeCloseTo(2 * STEP_METERS, 6);
    expect(acc.routeLength).toBe(2);
  });

  it('returns a copy of the route', () => {
    acc.ingest(makeSample(0, 0, 0));
    const route = acc.getRoute();
    route.push({ latitude: 1, longitude: 1 });
    expect(acc.routeLength).toBe(1);
  });

  it('clears everything on reset', () => {
    acc.ingest(makeSample(0, 0, 0));
    acc.ingest(makeSample(STEP_DEG, 0, 4000));
    acc.reset();

    expect(acc.distanceMeters).toBe(0);
    expect(acc.routeLength).toBe(0);
    expect(acc.lastAccepted).toBeNull();
  });
});
