import { describe, it, expect, vi, afterEach } from 'vitest';
import { createGpsProvider, type GpsProvider } from './index';
import type { LocationSample } from '@/types';

describe('createGpsProvider', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns a location source that works through the provider contract alone', async () => {
    vi.useFakeTimers();
    const provider: GpsProvider = createGpsProvider({
      originLatitude: 51.5,
      originLongitude: -0.12,
      intervalMs: 1000,
      speedMetersPerSecond: 3,
    });
    const samples: LocationSample[] = [];

    expect(await provider.requestPermissions()).toBe(true);
    provider.startWatching(s => samples.push(s), () => undefined);
    vi.advanceTimersByTime(1000);
    provider.stopWatching();
    vi.advanceTimersByTime(5000);

    expect(samples).toHaveLength(2);
    expect(samples[0]).toMatchObject({ latitude: 51.5, longitude: -0.12 });
    expect(Object.keys(provider)).not.toContain('supportsBackground');
  });
});
