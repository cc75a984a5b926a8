import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import WebSocket from 'ws';
import type { CityProgress, CompletedWorkoutSession, ProfileUpdate } from '@/types';
import { progressEarned, type CityRules, DEFAULT_CITY_RULES } from '@/goals/city-progress';
import type { WorkoutRepository } from './repository';
import {
  CityProgressRowSchema, ProfileRowSchema, WorkoutSessionRowSchema,
  type CityProgressRow, type ProfileRow, type WorkoutSessionRow
} from './schemas';

const TABLES = {
  userProfiles: 'user_profiles',
  workoutSessions: 'workout_sessions',
  cityProgress: 'city_progress',
} as const;

/** Column names of user_profiles that a ProfileUpdate may touch */
interface ProfileRowUpdate {
  current_streak?: number;
  longest_streak?: number;
  total_workouts?: number;
  last_workout_date?: string;
  onboarding_completed?: boolean;
  fitness_level?: string;
  goals?: string[];
}

export interface SupabaseClientOptions {
  fetch?: typeof fetch;
}

/**
 * Client for a long-running Node process: no stored auth session, and
 * `ws` as the realtime transport since Node.js 20 has no global WebSocket.
 */
export function createSupabaseClient(
  url: string,
  anonKey: string,
  options: SupabaseClientOptions = {}
): SupabaseClient {
  return createClient(url, anonKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    realtime: { transport: WebSocket },
    ...(options.fetch ? { global: { fetch: options.fetch } } : {}),
  });
}

export interface SupabaseRepositoryOptions {
  maxHistory: number;
  cityRules?: CityRules;
}

export function toSessionRow(
  session: CompletedWorkoutSession,
  userId: string,
  rules: CityRules = DEFAULT_CITY_RULES
): WorkoutSessionRow {
  return {
    id: session.id,
    user_id: userId,
    started_at: session.startTime.toISOString(),
    ended_at: session.endTime.toISOString(),
    duration: session.durationSeconds,
    distance_meters: session.distanceMeters,
    calories_burned: session.caloriesBurned,
    average_heart_rate: session.averageHeartRate,
    max_heart_rate: session.maxHeartRate,
    route: session.route,
    workout_type: session.workoutType,
    run_category: session.runCategory,
    city_progress_earned: progressEarned(session.durationSeconds, rules),
  };
}

export function fromSessionRow(row: WorkoutSessionRow): CompletedWorkoutSession {
  return {
    id: row.id,
    startTime: new Date(row.started_at),
    endTime: new Date(row.ended_at),
    durationSeconds: row.duration,
    distanceMeters: row.distance_meters,
    caloriesBurned: row.calories_burned,
    averageHeartRate: row.average_heart_rate,
    maxHeartRate: row.max_heart_rate,
    route: row.route ?? [],
    workoutType: row.workout_type,
    runCategory: row.run_category,
    isCompleted: true,
  };
}

export function toProfileRow(update: ProfileUpdate): ProfileRowUpdate {
  const row: ProfileRowUpdate = {};
  if (update.currentStreak !== undefined) row.current_streak = update.currentStreak;
  if (update.longestStreak !== undefined) row.longest_streak = update.longestStreak;
  if (update.totalWorkouts !== undefined) row.total_workouts = update.totalWorkouts;
  if (update.lastWorkoutDate !== undefined) row.last_workout_date = update.lastWorkoutDate.toISOString();
  if (update.onboardingCompleted !== undefined) row.onboarding_completed = update.onboardingCompleted;
  if (update.fitnessLevel !== undefined) row.fitness_level = update.fitnessLevel;
  if (update.goals !== undefined) row.goals = update.goals;
  return row;
}

export function fromProfileRow(row: ProfileRow): ProfileUpdate {
  const profile: ProfileUpdate = {};
  if (row.current_streak != null) profile.currentStreak = row.current_streak;
  if (row.longest_streak != null) profile.longestStreak = row.longest_streak;
  if (row.total_workouts != null) profile.totalWorkouts = row.total_workouts;
  if (row.last_workout_date != null) profile.lastWorkoutDate = new Date(row.last_workout_date);
  return profile;
}

function fromCityRow(row: CityProgressRow): CityProgress {
  return {
    userId: row.user_id,
    totalProgress: row.total_progress,
    buildingsUnlocked: row.buildings_unlocked,
    currentLevel: row.current_level,
    lastUpdated: row.last_updated ? new Date(row.last_updated) : null,
  };
}

/**
 * Repository backed by Supabase tables. Every query is scoped to the
 * signed-in user's id; row-level security does the rest server side.
 */
export class SupabaseWorkoutRepository implements WorkoutRepository {
  private readonly cityRules: CityRules;

  constructor(
    private readonly client: SupabaseClient,
    private readonly userId: string,
    private readonly options: SupabaseRepositoryOptions
  ) {
    this.cityRules = options.cityRules ?? DEFAULT_CITY_RULES;
  }

  async loadSessions(): Promise<CompletedWorkoutSession[]> {
    const { data, error } = await this.client
      .from(TABLES.workoutSessions)
      .select('*')
      .eq('user_id', this.userId)
      .order('started_at', { ascending: false })
      .limit(this.options.maxHistory);

    if (error) throw new Error(`Loading workout sessions failed: ${error.message}`);

    const rows = WorkoutSessionRowSchema.array().safeParse(data ?? []);
    if (!rows.success) throw new Error(`Unexpected workout_sessions rows: ${rows.error.message}`);
    return rows.data.map(fromSessionRow).reverse();
  }

  async appendSession(session: CompletedWorkoutSession): Promise<void> {
    const { error } = await this.client
      .from(TABLES.workoutSessions)
      .upsert(toSessionRow(session, this.userId, this.cityRules), { onConflict: 'id', ignoreDuplicates: true });

    if (error) throw new Error(`Saving workout session failed: ${error.message}`);
  }

  async loadCityProgress(): Promise<CityProgress | null> {
    const { data, error } = await this.client
      .from(TABLES.cityProgress)
      .select('*')
      .eq('user_id', this.userId)
      .limit(1);

    if (error) throw new Error(`Loading city progress failed: ${error.message}`);

    const rows = CityProgressRowSchema.array().safeParse(data ?? []);
    if (!rows.success) throw new Error(`Unexpected city_progress rows: ${rows.error.message}`);
    return rows.data.length > 0 ? fromCityRow(rows.data[0]) : null;
  }

  async saveCityProgress(progress: CityProgress): Promise<void> {
    const row: CityProgressRow = {
      user_id: this.userId,
      total_progress: progress.totalProgress,
      buildings_unlocked: progress.buildingsUnlocked,
      current_level: progress.currentLevel,
      last_updated: progress.lastUpdated ? progress.lastUpdated.toISOString() : null,
    };
    const { error } = await this.client
      .from(TABLES.cityProgress)
      .upsert(row, { onConflict: 'user_id' });

    if (error) throw new Error(`Saving city progress failed: ${error.message}`);
  }

  async loadProfile(): Promise<ProfileUpdate> {
    const { data, error } = await this.client
      .from(TABLES.userProfiles)
      .select('current_streak, longest_streak, total_workouts, last_workout_date')
      .eq('user_id', this.userId)
      .limit(1);

    if (error) throw new Error(`Loading profile failed: ${error.message}`);

    const rows = ProfileRowSchema.array().safeParse(data ?? []);
    if (!rows.success) throw new Error(`Unexpected user_profiles rows: ${rows.error.message}`);
    return rows.data.length > 0 ? fromProfileRow(rows.data[0]) : {};
  }

  async updateProfile(update: ProfileUpdate): Promise<void> {
    const row = toProfileRow(update);
    if (Object.keys(row).length === 0) return;

    const { error } = await this.client
      .from(TABLES.userProfiles)
      .update(row)
      .eq('user_id', this.userId);

    if (error) throw new Error(`Updating profile failed: ${error.message}`);
  }
}
