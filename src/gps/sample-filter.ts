import type { FilterThresholds, LocationSample, SampleDecision } from '@/types';
import { DEFAULT_THRESHOLDS } from '@/config';
import { elapsedBetween, sampleDistance } from './geo-math';

/** What the filter needs to know about the route retained so far */
export interface RouteState {
  length: number;
  last: LocationSample | null;
}

const REJECT_ACCURACY: SampleDecision = { accepted: false, appendToRoute: false, reason: 'accuracy' };
const REJECT_JITTER: SampleDecision = { accepted: false, appendToRoute: false, reason: 'jitter' };

/**
 * Decide whether a raw fix is accepted and whether it joins the route.
 *
 * Rules, in order:
 * 1. horizontal accuracy worse than maxAccuracy -> reject
 * 2. closer than minSpacing to the previous accepted fix -> reject
 * 3. route inclusion: always while the route has fewer than 2 points,
 *    otherwise at least minRouteSpacing from the last route point with an
 *    implied speed inside [minRouteSpeed, maxRouteSpeed]
 */
export function evaluateSample(
  previous: LocationSample | null,
  candidate: LocationSample,
  route: RouteState,
  thresholds: FilterThresholds = DEFAULT_THRESHOLDS
): SampleDecision {
  if (candidate.horizontalAccuracy > thresholds.maxAccuracy) return REJECT_ACCURACY;

  if (previous && sampleDistance(previous, candidate) < thresholds.minSpacing) {
    return REJECT_JITTER;
  }

  if (route.length < 2 || !route.last) {
    return { accepted: true, appendToRoute: true, reason: null };
  }

  const spacing = sampleDistance(route.last, candidate);
  if (spacing < thresholds.minRouteSpacing) {
    return { accepted: true, appendToRoute: false, reason: 'route-spacing' };
  }

  const elapsed = elapsedBetween(route.last, candidate);
  const speed = elapsed > 0 ? spacing / elapsed : Infinity;
  if (speed < thresholds.minRouteSpeed || speed > thresholds.maxRouteSpeed) {
    return { accepted: true, appendToRoute: false, reason: 'route-speed' };
  }

  return { accepted: true, appendToRoute: true, reason: null };
}

/**
 * Whether a distance increment between two accepted fixes counts.
 * Zero-length steps and jumps of maxIncrement or more are sensor glitches.
 */
export function isValidIncrement(
  meters: number,
  thresholds: FilterThresholds = DEFAULT_THRESHOLDS
): boolean {
  return meters > 0 && meters < thresholds.maxIncrement;
}
