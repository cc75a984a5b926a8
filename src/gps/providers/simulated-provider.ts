import type { SimulationConfig } from '@/config';
import type { GpsProvider, LocationCallback } from './types';

const METERS_PER_DEGREE_LAT = 111_320;
const LOOP_RADIUS_METERS = 200;

/**
 * Location source for running without a device: walks a circular loop
 * around the configured origin at a steady speed, one fix per interval.
 */
export class SimulatedGpsProvider implements GpsProvider {
  private timer: ReturnType<typeof setInterval> | null = null;
  private travelled = 0;

  constructor(
    private readonly config: SimulationConfig,
    private readonly now: () => number = Date.now
  ) {}

  async requestPermissions(): Promise<boolean> {
    return true;
  }

  startWatching(onSample: LocationCallback): void {
    if (this.timer) return;

    const step = this.config.speedMetersPerSecond * (this.config.intervalMs / 1000);
    const emit = () => {
      const angle = this.travelled / LOOP_RADIUS_METERS;
      const northMeters = Math.sin(angle) * LOOP_RADIUS_METERS;
      const eastMeters = (1 - Math.cos(angle)) * LOOP_RADIUS_METERS;
      const metersPerDegreeLng = METERS_PER_DEGREE_LAT * Math.cos((this.config.originLatitude * Math.PI) / 180);

      onSample({
        latitude: this.config.originLatitude + northMeters / METERS_PER_DEGREE_LAT,
        longitude: this.config.originLongitude + eastMeters / metersPerDegreeLng,
        altitude: 10 + Math.sin(angle) * 5,
        horizontalAccuracy: 5,
        speed: this.config.speedMetersPerSecond,
        course: ((angle * 180) / Math.PI + 90) % 360,
        timestamp: this.now(),
      });
      this.travelled += step;
    };

    emit();
    this.timer = setInterval(emit, this.config.intervalMs);
  }

  stopWatching(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get isWatching(): boolean {
    return this.timer !== null;
  }
}
