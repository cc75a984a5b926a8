import type { CompletedWorkoutSession, LocationSample, RunCategory, WorkoutType } from '@/types';

/** A location fix with good accuracy unless told otherwise */
export function makeSample(
  latitude: number,
  longitude: number,
  timestamp: number,
  horizontalAccuracy: number = 5
): LocationSample {
  return { latitude, longitude, altitude: null, horizontalAccuracy, speed: null, course: null, timestamp };
}

/** ~11.12 m of latitude at the equator */
export const STEP_DEG = 0.0001;

export function makeCompletedSession(
  id: string,
  startTime: Date,
  overrides: Partial<{
    durationSeconds: number;
    distanceMeters: number;
    workoutType: WorkoutType;
    runCategory: RunCategory;
  }> = {}
): CompletedWorkoutSession {
  const durationSeconds = overrides.durationSeconds ?? 1200;
  return {
    id,
    startTime,
    endTime: new Date(startTime.getTime() + durationSeconds * 1000),
    durationSeconds,
    distanceMeters: overrides.distanceMeters ?? 3000,
    caloriesBurned: 240,
    averageHeartRate: null,
    maxHeartRate: null,
    route: [],
    workoutType: overrides.workoutType ?? 'running',
    runCategory: overrides.runCategory ?? 'mediumRun',
    isCompleted: true,
  };
}
