import type { RoutePoint } from './gps';

export type WorkoutType = 'running' | 'walking' | 'cycling' | 'cardio';

export type RunCategory =
  | 'sprint' | 'shortRun' | 'mediumRun' | 'longRun'
  | 'recoveryRun' | 'tempoRun' | 'easyRun';

interface WorkoutSessionBase {
  id: string;
  startTime: Date;
  durationSeconds: number;
  distanceMeters: number;
  caloriesBurned: number;
  averageHeartRate: number | null;
  maxHeartRate: number | null;
  route: RoutePoint[];
  workoutType: WorkoutType;
}

/** A session still owned by the lifecycle manager */
export interface ActiveWorkoutSession extends WorkoutSessionBase {
  isCompleted: false;
  endTime: null;
  runCategory: null;
}

/** A frozen session that has moved into history */
export interface CompletedWorkoutSession extends WorkoutSessionBase {
  isCompleted: true;
  endTime: Date;
  runCategory: RunCategory;
}

/** endTime and runCategory are present exactly when the session is completed */
export type WorkoutSession = ActiveWorkoutSession | CompletedWorkoutSession;

/** Lifecycle states of the session manager */
export type SessionStatus = 'idle' | 'active' | 'paused';

/** Live metrics recomputed on every tick */
export interface LiveMetrics {
  elapsedSeconds: number;
  distanceMeters: number;
  caloriesBurned: number;
  currentPace: number | null;   // sec/km, null until distance is recorded
  averagePace: number | null;   // sec/km
  averageSpeed: number | null;  // m/s
}

/** Snapshot handed to listeners on every tick, fix and transition */
export interface SessionLiveData extends LiveMetrics {
  status: SessionStatus;
  sessionId: string | null;
  workoutType: WorkoutType | null;
  routePoints: number;
  currentSpeed: number | null;  // m/s reported by the last accepted fix
  altitude: number | null;
  accuracy: number | null;      // horizontal accuracy of the last fix seen
  locationAvailable: boolean;
  lastError: string | null;
}

/** Workout time credited today toward the daily goal */
export interface DailyGoalProgress {
  accumulatedSeconds: number;
  lastResetDate: string; // yyyy-MM-dd, local calendar day
}

export interface StreakMetrics {
  currentStreak: number;
  longestStreak: number;
  totalWorkouts: number;
}

/** City-building progress earned from workout time */
export interface CityProgress {
  userId: string;
  totalProgress: number;
  buildingsUnlocked: number;
  currentLevel: number;
  lastUpdated: Date | null;
}

/** Typed partial update of the user's profile row */
export interface ProfileUpdate {
  currentStreak?: number;
  longestStreak?: number;
  totalWorkouts?: number;
  lastWorkoutDate?: Date;
  onboardingCompleted?: boolean;
  fitnessLevel?: string;
  goals?: string[];
}
