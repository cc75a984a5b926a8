import type { LiveMetrics, WorkoutType } from '@/types';
import { CALORIES_PER_MINUTE } from '@/constants';
import { calculatePace, calculateSpeed } from '@/gps/geo-math';

/**
 * Calories burned after a given active time, truncated to whole calories.
 * @param elapsedSeconds - Active (unpaused) time
 * @param type - Workout type, selects the per-minute rate
 */
export function calculateCalories(elapsedSeconds: number, type: WorkoutType): number {
  return Math.trunc((elapsedSeconds / 60) * CALORIES_PER_MINUTE[type]);
}

/**
 * Derive the live metrics for a session from its counters.
 *
 * Average pace is the same figure as current pace: both are cumulative
 * elapsed time over cumulative distance.
 */
export function computeLiveMetrics(
  elapsedSeconds: number,
  distanceMeters: number,
  type: WorkoutType
): LiveMetrics {
  const pace = calculatePace(distanceMeters, elapsedSeconds);
  return {
    elapsedSeconds,
    distanceMeters,
    caloriesBurned: calculateCalories(elapsedSeconds, type),
    currentPace: pace,
    averagePace: pace,
    averageSpeed: distanceMeters > 0 ? calculateSpeed(distanceMeters, elapsedSeconds) : null,
  };
}

/** Metrics of a session that has not accumulated anything yet */
export const EMPTY_METRICS: LiveMetrics = {
  elapsedSeconds: 0,
  distanceMeters: 0,
  caloriesBurned: 0,
  currentPace: null,
  averagePace: null,
  averageSpeed: null,
};
