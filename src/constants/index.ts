export { CALORIES_PER_MINUTE, WORKOUT_TYPES, RUN_CATEGORY_LABELS, isWorkoutType } from './workouts';
export { STREAK_TEMPLATES, MORNING_REMINDERS, EVENING_REMINDERS } from './notifications';
