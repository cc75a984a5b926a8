import { z } from 'zod';

const WorkoutTypeSchema = z.enum(['running', 'walking', 'cycling', 'cardio']);

const RunCategorySchema = z.enum([
  'sprint', 'shortRun', 'mediumRun', 'longRun', 'recoveryRun', 'tempoRun', 'easyRun',
]);

const RoutePointSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
});

export const CompletedSessionSchema = z.object({
  id: z.string(),
  startTime: z.coerce.date(),
  endTime: z.coerce.date(),
  durationSeconds: z.number().nonnegative(),
  distanceMeters: z.number().nonnegative(),
  caloriesBurned: z.number().int().nonnegative(),
  averageHeartRate: z.number().nullable(),
  maxHeartRate: z.number().nullable(),
  route: z.array(RoutePointSchema),
  workoutType: WorkoutTypeSchema,
  runCategory: RunCategorySchema,
  isCompleted: z.literal(true),
});

export const HistorySchema = z.array(CompletedSessionSchema);

export const DailyGoalSchema = z.object({
  accumulatedSeconds: z.number().nonnegative(),
  lastResetDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});

export const CityProgressSchema = z.object({
  userId: z.string(),
  totalProgress: z.number().int().nonnegative(),
  buildingsUnlocked: z.number().int().nonnegative(),
  currentLevel: z.number().int().positive(),
  lastUpdated: z.coerce.date().nullable(),
});

export const ProfileSchema = z.object({
  currentStreak: z.number().int().optional(),
  longestStreak: z.number().int().optional(),
  totalWorkouts: z.number().int().optional(),
  lastWorkoutDate: z.coerce.date().optional(),
  onboardingCompleted: z.boolean().optional(),
  fitnessLevel: z.string().optional(),
  goals: z.array(z.string()).optional(),
});

/** Row shape of the remote workout_sessions table */
export const WorkoutSessionRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  started_at: z.string(),
  ended_at: z.string(),
  duration: z.number(),
  distance_meters: z.number(),
  calories_burned: z.number(),
  average_heart_rate: z.number().nullable(),
  max_heart_rate: z.number().nullable(),
  route: z.array(RoutePointSchema).nullable(),
  workout_type: WorkoutTypeSchema,
  run_category: RunCategorySchema,
  city_progress_earned: z.number(),
});

export type WorkoutSessionRow = z.infer<typeof WorkoutSessionRowSchema>;

/** Row shape of the remote city_progress table */
export const CityProgressRowSchema = z.object({
  user_id: z.string(),
  total_progress: z.number(),
  buildings_unlocked: z.number(),
  current_level: z.number(),
  last_updated: z.string().nullable(),
});

export type CityProgressRow = z.infer<typeof CityProgressRowSchema>;

/** Counter columns of the remote user_profiles table */
export const ProfileRowSchema = z.object({
  current_streak: z.number().nullish(),
  longest_streak: z.number().nullish(),
  total_workouts: z.number().nullish(),
  last_workout_date: z.string().nullish(),
});

export type ProfileRow = z.infer<typeof ProfileRowSchema>;
