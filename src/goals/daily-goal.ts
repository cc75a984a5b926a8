import { format } from 'date-fns';
import type { DailyGoalProgress } from '@/types';
import { DAILY_GOAL_SECONDS } from '@/config';
import { DailyGoalSchema } from '@/state/schemas';
import { STORAGE_KEYS, loadJson, saveJson } from '@/state/persistence';
import type { KeyValueStore } from '@/state/storage';
import { logger as defaultLogger, type Logger } from '@/utils/logger';

export interface DailyGoalOptions {
  goalSeconds?: number;
  log?: Logger;
}

function dayKey(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Workout time credited toward today's goal. Progress resets when the
 * calendar day changes and is saved after every change.
 */
export class DailyGoalTracker {
  private readonly goalSeconds: number;
  private readonly log: Logger;

  private constructor(
    private readonly store: KeyValueStore,
    private progress: DailyGoalProgress,
    options: DailyGoalOptions
  ) {
    this.goalSeconds = options.goalSeconds ?? DAILY_GOAL_SECONDS;
    this.log = options.log ?? defaultLogger.child('daily-goal');
  }

  /** Read saved progress; anything unreadable starts the day at zero. */
  static async load(store: KeyValueStore, now: Date, options: DailyGoalOptions = {}): Promise<DailyGoalTracker> {
    const saved = await loadJson(store, STORAGE_KEYS.dailyGoal, DailyGoalSchema, options.log);
    const tracker = new DailyGoalTracker(
      store,
      saved ?? { accumulatedSeconds: 0, lastResetDate: dayKey(now) },
      options
    );
    if (tracker.rollover(now)) await tracker.persist();
    return tracker;
  }

  get accumulatedSeconds(): number {
    return this.progress.accumulatedSeconds;
  }

  get lastResetDate(): string {
    return this.progress.lastResetDate;
  }

  /** Fraction of the goal reached, capped at 1. */
  progressRatio(): number {
    return Math.min(this.progress.accumulatedSeconds / this.goalSeconds, 1.0);
  }

  isGoalReached(): boolean {
    return this.progressRatio() >= 1;
  }

  /** Add workout time, starting a fresh day first if the date moved on. */
  async credit(seconds: number, now: Date): Promise<void> {
    this.rollover(now);
    this.progress = {
      ...this.progress,
      accumulatedSeconds: this.progress.accumulatedSeconds + Math.max(0, seconds),
    };
    await this.persist();
  }

  private rollover(now: Date): boolean {
    const today = dayKey(now);
    if (this.progress.lastResetDate === today) return false;
    this.log.debug('New day, resetting goal progress', { previous: this.progress.lastResetDate, today });
    this.progress = { accumulatedSeconds: 0, lastResetDate: today };
    return true;
  }

  private async persist(): Promise<void> {
    try {
      await saveJson(this.store, STORAGE_KEYS.dailyGoal, this.progress);
    } catch (error) {
      this.log.error('Failed to save daily goal progress', error);
    }
  }
}
