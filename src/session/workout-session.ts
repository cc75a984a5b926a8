import { randomUUID } from 'node:crypto';
import type {
  ActiveWorkoutSession, CityProgress, CompletedWorkoutSession, FilterThresholds, LiveMetrics,
  LocationSample, SessionLiveData, SessionStatus, WorkoutType
} from '@/types';
import type { GpsProvider } from '@/gps/providers/types';
import { RouteAccumulator } from '@/gps/route-accumulator';
import { EMPTY_METRICS, calculateCalories, computeLiveMetrics } from '@/calculations/metrics';
import { classifyRun } from '@/calculations/run-classifier';
import { computeStreakMetrics, nextProfileCounters } from '@/calculations/streaks';
import {
  applyWorkout, initialCityProgress, type CityRules, DEFAULT_CITY_RULES
} from '@/goals/city-progress';
import type { DailyGoalTracker } from '@/goals/daily-goal';
import type { StreakNotifier } from '@/notifications/notifier';
import type { WorkoutHistory } from '@/state/history';
import type { WorkoutRepository } from '@/state/repository';
import { logger as defaultLogger, type Logger } from '@/utils/logger';
import type { TickSource } from './ticker';

export type SessionUpdateCallback = (data: SessionLiveData) => void;

export interface WorkoutSessionDeps {
  provider: GpsProvider;
  ticker: TickSource;
  history: WorkoutHistory;
  dailyGoal: DailyGoalTracker;
  /** Receives city progress and profile stats after each workout */
  repository?: WorkoutRepository;
  /** City progress as loaded at startup */
  cityProgress?: CityProgress;
  userId?: string;
  notifier?: StreakNotifier;
  thresholds?: FilterThresholds;
  cityRules?: CityRules;
  now?: () => Date;
  createId?: () => string;
  log?: Logger;
}

/**
 * Owns the single in-progress workout: drives the tick timer and the
 * location subscription, folds fixes into distance and route, and hands
 * the frozen record to history when the workout ends.
 *
 * State machine: idle -> active <-> paused -> idle
 *
 * Ticks and fixes both arrive as event-loop callbacks, so each handler
 * sees the counters without interleaving.
 */
export class WorkoutSessionManager {
  private status: SessionStatus = 'idle';
  private session: ActiveWorkoutSession | null = null;
  private readonly accumulator: RouteAccumulator;
  private elapsedSeconds = 0;
  private metrics: LiveMetrics = EMPTY_METRICS;
  private locationAvailable = false;
  private watching = false;
  private lastAccuracy: number | null = null;
  private lastError: string | null = null;
  private cityProgress: CityProgress | null;
  private listeners: SessionUpdateCallback[] = [];
  private pending: Promise<void> = Promise.resolve();

  private readonly now: () => Date;
  private readonly createId: () => string;
  private readonly cityRules: CityRules;
  private readonly log: Logger;

  constructor(private readonly deps: WorkoutSessionDeps) {
    this.accumulator = new RouteAccumulator(deps.thresholds);
    this.cityProgress = deps.cityProgress ?? null;
    this.now = deps.now ?? (() => new Date());
    this.createId = deps.createId ?? randomUUID;
    this.cityRules = deps.cityRules ?? DEFAULT_CITY_RULES;
    this.log = deps.log ?? defaultLogger.child('session');
  }

  /** Register a listener for live data updates */
  onUpdate(cb: SessionUpdateCallback): void {
    this.listeners.push(cb);
  }

  /** Remove a listener */
  offUpdate(cb: SessionUpdateCallback): void {
    this.listeners = this.listeners.filter(l => l !== cb);
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  getCityProgress(): CityProgress | null {
    return this.cityProgress;
  }

  /** Copy of the in-progress session, null while idle */
  getCurrentSession(): ActiveWorkoutSession | null {
    if (!this.session) return null;
    return {
      ...this.session,
      durationSeconds: this.elapsedSeconds,
      distanceMeters: this.accumulator.distanceMeters,
      caloriesBurned: this.metrics.caloriesBurned,
      route: this.accumulator.getRoute(),
    };
  }

  /** Get current live data snapshot */
  getLiveData(): SessionLiveData {
    const last = this.accumulator.lastAccepted;
    return {
      ...this.metrics,
      distanceMeters: this.accumulator.distanceMeters,
      status: this.status,
      sessionId: this.session?.id ?? null,
      workoutType: this.session?.workoutType ?? null,
      routePoints: this.accumulator.routeLength,
      currentSpeed: last?.speed ?? null,
      altitude: last?.altitude ?? null,
      accuracy: this.lastAccuracy,
      locationAvailable: this.locationAvailable,
      lastError: this.lastError,
    };
  }

  /**
   * Start a new workout. Resolves false when one is already running.
   * Without location permission the workout still runs on time alone.
   */
  async start(type: WorkoutType = 'running'): Promise<boolean> {
    if (this.status !== 'idle') return false;

    this.resetCounters();
    const session: ActiveWorkoutSession = {
      id: this.createId(),
      startTime: this.now(),
      endTime: null,
      durationSeconds: 0,
      distanceMeters: 0,
      caloriesBurned: 0,
      averageHeartRate: null,
      maxHeartRate: null,
      route: [],
      workoutType: type,
      runCategory: null,
      isCompleted: false,
    };
    this.session = session;
    this.status = 'active';
    this.metrics = computeLiveMetrics(0, 0, type);
    this.deps.ticker.start(() => this.handleTick());
    this.log.info('Workout started', { sessionId: session.id, type });
    this.notify();

    let granted = false;
    try {
      granted = await this.deps.provider.requestPermissions();
    } catch (error) {
      this.log.warn('Location permission request failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    // The workout may have been ended while waiting for permission
    if (this.session?.id !== session.id) return true;

    this.locationAvailable = granted;
    if (!granted) {
      this.log.warn('Location unavailable, tracking time only', { sessionId: session.id });
    } else if (this.status === 'active') {
      this.startWatching();
    }
    this.notify();
    return true;
  }

  /** Pause tracking: stops the timer and the location subscription */
  pause(): void {
    if (this.status !== 'active') return;
    this.deps.ticker.stop();
    this.stopWatching();
    this.status = 'paused';
    this.notify();
  }

  /** Resume from pause without touching the counters */
  resume(): void {
    if (this.status !== 'paused' || !this.session) return;
    this.status = 'active';
    this.deps.ticker.start(() => this.handleTick());
    if (this.locationAvailable) this.startWatching();
    this.notify();
  }

  /**
   * Finish the workout: freeze and classify it, append it to history and
   * credit the daily goal. Returns the completed record, or null when
   * there was nothing to end. Persistence continues in the background;
   * await flush() to wait for it.
   */
  end(): CompletedWorkoutSession | null {
    if (!this.session || this.status === 'idle') return null;

    this.deps.ticker.stop();
    this.stopWatching();

    const durationSeconds = this.elapsedSeconds;
    const distanceMeters = this.accumulator.distanceMeters;
    const completed: CompletedWorkoutSession = {
      ...this.session,
      endTime: this.now(),
      durationSeconds,
      distanceMeters,
      caloriesBurned: calculateCalories(durationSeconds, this.session.workoutType),
      route: this.accumulator.getRoute(),
      runCategory: classifyRun(durationSeconds, distanceMeters),
      isCompleted: true,
    };

    const appended = this.deps.history.append(completed);
    this.pending = this.pending
      .then(() => this.afterCompletion(completed, appended))
      .catch((error: unknown) => {
        this.log.error('Post-workout bookkeeping failed', error, { sessionId: completed.id });
      });

    this.log.info('Workout completed', {
      sessionId: completed.id,
      durationSeconds,
      distanceMeters: Math.round(distanceMeters),
      runCategory: completed.runCategory,
    });

    this.session = null;
    this.status = 'idle';
    this.resetCounters();
    this.notify();
    return completed;
  }

  /** Resolves once every write started by end() has settled */
  async flush(): Promise<void> {
    await this.pending;
    await this.deps.history.flush();
  }

  /** Stop background work at shutdown. An active workout is paused, not lost. */
  dispose(): void {
    this.pause();
    this.deps.ticker.stop();
    this.stopWatching();
    this.listeners = [];
  }

  private async afterCompletion(completed: CompletedWorkoutSession, appended: Promise<boolean>): Promise<void> {
    // A workout counts toward the day it started on, for both goal and streak
    const day = completed.startTime;
    await this.deps.dailyGoal.credit(completed.durationSeconds, day);
    await appended;

    let streaks = computeStreakMetrics(this.deps.history.getSessions(), day);

    const repository = this.deps.repository;
    if (repository) {
      try {
        const current = this.cityProgress ?? initialCityProgress(this.deps.userId ?? 'local-user');
        this.cityProgress = applyWorkout(current, completed, this.cityRules);
        await repository.saveCityProgress(this.cityProgress);
        streaks = nextProfileCounters(streaks, await repository.loadProfile(), day);
        await repository.updateProfile({
          currentStreak: streaks.currentStreak,
          longestStreak: streaks.longestStreak,
          totalWorkouts: streaks.totalWorkouts,
          lastWorkoutDate: day,
        });
      } catch (error) {
        this.log.error('Failed to update city progress or profile', error, { sessionId: completed.id });
      }
    }

    if (this.deps.dailyGoal.isGoalReached()) {
      this.deps.notifier?.scheduleStreakNotification(streaks.currentStreak);
    }
  }

  /** Advance elapsed time and recompute the derived metrics */
  private handleTick(): void {
    if (this.status !== 'active' || !this.session) return;
    this.elapsedSeconds += this.deps.ticker.intervalSeconds;
    this.metrics = computeLiveMetrics(
      this.elapsedSeconds,
      this.accumulator.distanceMeters,
      this.session.workoutType
    );
    this.notify();
  }

  /** Process an incoming fix */
  private handleSample(sample: LocationSample): void {
    this.lastAccuracy = sample.horizontalAccuracy;
    if (this.status !== 'active') return;

    const { decision } = this.accumulator.ingest(sample);
    if (decision.accepted) this.lastError = null;
    this.notify();
  }

  private handleError(error: Error): void {
    this.lastError = error.message;
    this.log.warn('Location source error', { error: error.message, sessionId: this.session?.id });
    this.notify();
  }

  private startWatching(): void {
    if (this.watching) return;
    this.watching = true;
    this.deps.provider.startWatching(
      sample => this.handleSample(sample),
      error => this.handleError(error)
    );
  }

  private stopWatching(): void {
    if (!this.watching) return;
    this.watching = false;
    this.deps.provider.stopWatching();
  }

  private resetCounters(): void {
    this.accumulator.reset();
    this.elapsedSeconds = 0;
    this.metrics = EMPTY_METRICS;
    this.locationAvailable = false;
    this.lastAccuracy = null;
    this.lastError = null;
  }

  /** Notify all listeners */
  private notify(): void {
    const data = this.getLiveData();
    for (const cb of this.listeners) {
      cb(data);
    }
  }
}
