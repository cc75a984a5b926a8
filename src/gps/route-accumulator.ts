import type { FilterThresholds, LocationSample, RoutePoint, SampleDecision } from '@/types';
import { DEFAULT_THRESHOLDS } from '@/config';
import { sampleDistance } from './geo-math';
import { evaluateSample, isValidIncrement } from './sample-filter';

export interface IngestResult {
  decision: SampleDecision;
  /** Distance credited for this fix, 0 when nothing was added */
  increment: number;
}

/**
 * Integrates filtered fixes into a running distance and a route polyline.
 * Distance only ever grows; a discarded increment leaves it untouched.
 */
export class RouteAccumulator {
  private previous: LocationSample | null = null;
  private lastRouteSample: LocationSample | null = null;
  private route: RoutePoint[] = [];
  private distance = 0;

  constructor(private readonly thresholds: FilterThresholds = DEFAULT_THRESHOLDS) {}

  get distanceMeters(): number {
    return this.distance;
  }

  /** Latest accepted fix, used for live speed / altitude display */
  get lastAccepted(): LocationSample | null {
    return this.previous;
  }

  getRoute(): RoutePoint[] {
    return this.route.map(p => ({ ...p }));
  }

  get routeLength(): number {
    return this.route.length;
  }

  ingest(sample: LocationSample): IngestResult {
    const decision = evaluateSample(
      this.previous,
      sample,
      { length: this.route.length, last: this.lastRouteSample },
      this.thresholds
    );
    if (!decision.accepted) return { decision, increment: 0 };

    let increment = 0;
    if (this.previous) {
      const step = sampleDistance(this.previous, sample);
      if (isValidIncrement(step, this.thresholds)) {
        increment = step;
        this.distance += step;
      }
    }
    this.previous = sample;

    if (decision.appendToRoute) {
      this.route.push({ latitude: sample.latitude, longitude: sample.longitude });
      this.lastRouteSample = sample;
    }

    return { decision, increment };
  }

  reset(): void {
    this.previous = null;
    this.lastRouteSample = null;
    this.route = [];
    this.distance = 0;
  }
}
