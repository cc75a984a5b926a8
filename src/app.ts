import * as path from 'node:path';
import type { AppConfig } from '@/config';
import type { CityProgress, StreakMetrics } from '@/types';
import type { GpsProvider } from '@/gps/providers/types';
import { createGpsProvider } from '@/gps/providers';
import { computeStreakMetrics } from '@/calculations/streaks';
import { initialCityProgress } from '@/goals/city-progress';
import { DailyGoalTracker } from '@/goals/daily-goal';
import { LogNotifier, type StreakNotifier } from '@/notifications/notifier';
import { IntervalTicker, type TickSource } from '@/session/ticker';
import { WorkoutSessionManager } from '@/session/workout-session';
import { WorkoutHistory } from '@/state/history';
import { LocalWorkoutRepository, type WorkoutRepository } from '@/state/repository';
import { FileKeyValueStore, MemoryKeyValueStore, type KeyValueStore } from '@/state/storage';
import { SupabaseWorkoutRepository, createSupabaseClient } from '@/state/supabase-repository';
import { logger } from '@/utils/logger';

/** Collaborators a caller may substitute, mainly for tests */
export interface AppOverrides {
  store?: KeyValueStore;
  repository?: WorkoutRepository;
  provider?: GpsProvider;
  ticker?: TickSource;
  notifier?: StreakNotifier;
  now?: () => Date;
}

export interface App {
  config: AppConfig;
  session: WorkoutSessionManager;
  history: WorkoutHistory;
  dailyGoal: DailyGoalTracker;
  repository: WorkoutRepository;
  streaks(): StreakMetrics;
  shutdown(): Promise<void>;
}

function createStore(config: AppConfig): KeyValueStore {
  return config.storage.backend === 'memory'
    ? new MemoryKeyValueStore()
    : new FileKeyValueStore(path.resolve(config.storage.dataDir));
}

function createRepository(config: AppConfig, store: KeyValueStore): WorkoutRepository {
  const { storage, goal } = config;
  if (storage.backend !== 'supabase') {
    return new LocalWorkoutRepository(store, logger.child('repository'));
  }
  if (!storage.supabaseUrl || !storage.supabaseAnonKey) {
    throw new TypeError('Supabase backend selected without SUPABASE_URL / SUPABASE_ANON_KEY');
  }
  const client = createSupabaseClient(storage.supabaseUrl, storage.supabaseAnonKey);
  return new SupabaseWorkoutRepository(client, storage.userId, {
    maxHistory: storage.maxHistory,
    cityRules: goal,
  });
}

/**
 * Composition root: builds one instance of every service, loads what
 * was persisted and wires the session manager to it.
 */
export async function createApp(config: AppConfig, overrides: AppOverrides = {}): Promise<App> {
  const now = overrides.now ?? (() => new Date());
  const store = overrides.store ?? createStore(config);
  const repository = overrides.repository ?? createRepository(config, store);

  const history = new WorkoutHistory(repository, { retry: config.retry, log: logger.child('history') });
  await history.load();

  const dailyGoal = await DailyGoalTracker.load(store, now(), {
    goalSeconds: config.goal.dailyGoalSeconds,
    log: logger.child('daily-goal'),
  });

  let cityProgress: CityProgress;
  try {
    cityProgress = (await repository.loadCityProgress()) ?? initialCityProgress(config.storage.userId);
  } catch (error) {
    logger.error('Failed to load city progress, starting fresh', error);
    cityProgress = initialCityProgress(config.storage.userId);
  }

  const session = new WorkoutSessionManager({
    provider: overrides.provider ?? createGpsProvider(config.simulation),
    ticker: overrides.ticker ?? new IntervalTicker(config.tracking.tickIntervalMs),
    history,
    dailyGoal,
    repository,
    cityProgress,
    userId: config.storage.userId,
    notifier: overrides.notifier ?? new LogNotifier(),
    thresholds: config.tracking.thresholds,
    cityRules: config.goal,
    now,
    log: logger.child('session'),
  });

  return {
    config,
    session,
    history,
    dailyGoal,
    repository,
    streaks: () => computeStreakMetrics(history.getSessions(), now()),
    async shutdown() {
      session.dispose();
      await session.flush();
    },
  };
}
