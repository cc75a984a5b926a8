import { describe, it, expect, vi, afterEach } from 'vitest';
import { SimulatedGpsProvider } from './simulated-provider';
import { sampleDistance } from '../geo-math';
import type { LocationSample } from '@/types';

const CONFIG = {
  originLatitude: 37.7749,
  originLongitude: -122.4194,
  intervalMs: 2000,
  speedMetersPerSecond: 3,
};

describe('SimulatedGpsProvider', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('grants permission', async () => {
    expect(await new SimulatedGpsProvider(CONFIG).requestPermissions()).toBe(true);
  });

  it('emits a fix at the origin immediately, then one per interval', () => {
    vi.useFakeTimers();
    let now = 1_000_000;
    const provider = new SimulatedGpsProvider(CONFIG, () => now);
    const samples: LocationSample[] = [];

    provider.startWatching(s => samples.push(s));
    now += 2000;
    vi.advanceTimersByTime(2000);
    provider.stopWatching();
    vi.advanceTimersByTime(10000);

    expect(samples).toHaveLength(2);
    expect(samples[0]).toMatchObject({ latitude: 37.7749, longitude: -122.4194, horizontalAccuracy: 5, timestamp: 1_000_000 });
    expect(samples[1].timestamp).toBe(1_002_000);
    // 3 m/s for 2 s along the loop
    expect(sampleDistance(samples[0], samples[1])).toBeCloseTo(6, 0);
    expect(provider.isWatching).toBe(false);
  });
});
