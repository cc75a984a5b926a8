/**
 * Centralized configuration for the tracking engine and its collaborators.
 *
 * Configuration categories:
 * - Tracking: tick cadence and sample filter limits
 * - Goal: daily activity target and city progress rules
 * - Storage: persistence backend selection
 * - Retry: backoff for persistence writes
 * - Simulation: the simulated location source used by the CLI
 *
 * Values can be overridden via environment variables where noted.
 */

import type { FilterThresholds } from '@/types';

export type Env = Record<string, string | undefined>;

export type StorageBackend = 'file' | 'memory' | 'supabase';

export interface TrackingConfig {
  /** @env TICK_INTERVAL_MS */
  tickIntervalMs: number;
  thresholds: FilterThresholds;
}

export interface GoalConfig {
  /** @env DAILY_GOAL_SECONDS */
  dailyGoalSeconds: number;
  /** Workout seconds needed for one point of city progress */
  secondsPerProgressPoint: number;
  buildingsPerLevel: number;
}

export interface StorageConfig {
  /** @env STORAGE_BACKEND */
  backend: StorageBackend;
  /** @env DATA_DIR */
  dataDir: string;
  /** @env SUPABASE_URL */
  supabaseUrl: string | null;
  /** @env SUPABASE_ANON_KEY */
  supabaseAnonKey: string | null;
  /** @env USER_ID */
  userId: string;
  /** Most recent sessions fetched from the remote backend */
  maxHistory: number;
}

export interface RetryConfig {
  maxRetries: number;
  /** Actual delay = baseDelayMs * 2^attemptNumber */
  baseDelayMs: number;
}

export interface SimulationConfig {
  originLatitude: number;
  originLongitude: number;
  intervalMs: number;
  speedMetersPerSecond: number;
}

export interface AppConfig {
  tracking: TrackingConfig;
  goal: GoalConfig;
  storage: StorageConfig;
  retry: RetryConfig;
  simulation: SimulationConfig;
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Parse an integer from an environment variable.
 * @throws TypeError if value is set but not a valid integer
 */
function parseIntSafe(value: string | undefined, defaultValue: number, variableName: string): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new TypeError(`Invalid ${variableName}: "${value}" is not a valid integer`);
  }
  return parsed;
}

function parseBackend(value: string | undefined): StorageBackend {
  if (!value) return 'file';
  if (value === 'file' || value === 'memory' || value === 'supabase') return value;
  throw new TypeError(`Invalid STORAGE_BACKEND: "${value}" (expected file, memory or supabase)`);
}

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_THRESHOLDS: FilterThresholds = {
  maxAccuracy: 20,
  minSpacing: 3,
  minRouteSpacing: 5,
  minRouteSpeed: 0.5,
  maxRouteSpeed: 10,
  maxIncrement: 100,
};

export const DAILY_GOAL_SECONDS = 15 * 60;

/**
 * Build the application configuration from an environment map.
 * @throws TypeError on malformed values or missing Supabase credentials
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const backend = parseBackend(env.STORAGE_BACKEND);
  const supabaseUrl = env.SUPABASE_URL ?? null;
  const supabaseAnonKey = env.SUPABASE_ANON_KEY ?? null;

  if (backend === 'supabase' && (!supabaseUrl || !supabaseAnonKey)) {
    throw new TypeError('STORAGE_BACKEND=supabase requires SUPABASE_URL and SUPABASE_ANON_KEY');
  }

  return {
    tracking: {
      tickIntervalMs: parseIntSafe(env.TICK_INTERVAL_MS, 1000, 'TICK_INTERVAL_MS'),
      thresholds: { ...DEFAULT_THRESHOLDS },
    },
    goal: {
      dailyGoalSeconds: parseIntSafe(env.DAILY_GOAL_SECONDS, DAILY_GOAL_SECONDS, 'DAILY_GOAL_SECONDS'),
      secondsPerProgressPoint: 15 * 60,
      buildingsPerLevel: 5,
    },
    storage: {
      backend,
      dataDir: env.DATA_DIR ?? '.stride-city',
      supabaseUrl,
      supabaseAnonKey,
      userId: env.USER_ID ?? 'local-user',
      maxHistory: 50,
    },
    retry: {
      maxRetries: 3,
      baseDelayMs: 500,
    },
    simulation: {
      originLatitude: 37.7749,
      originLongitude: -122.4194,
      intervalMs: 2000,
      speedMetersPerSecond: 3,
    },
  };
}
