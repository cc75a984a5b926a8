import type { RunCategory, WorkoutType } from '@/types';

/** Energy cost per minute of activity, by workout type */
export const CALORIES_PER_MINUTE: Record<WorkoutType, number> = {
  running: 12.0,
  walking: 6.0,
  cycling: 8.0,
  cardio: 10.0,
};

export const WORKOUT_TYPES: readonly WorkoutType[] = ['running', 'walking', 'cycling', 'cardio'];

/** Human-readable labels for run categories */
export const RUN_CATEGORY_LABELS: Record<RunCategory, string> = {
  sprint: 'Sprint',
  shortRun: 'Short Run',
  mediumRun: 'Medium Run',
  longRun: 'Long Run',
  recoveryRun: 'Recovery Run',
  tempoRun: 'Tempo Run',
  easyRun: 'Easy Run',
};

export function isWorkoutType(value: string): value is WorkoutType {
  return WORKOUT_TYPES.some(type => type === value);
}
