import { describe, it, expect } from 'vitest';
import { createApp } from './app';
import { loadConfig } from './config';
import { MockGpsProvider } from '@/gps/providers';
import { ManualTicker } from '@/session/ticker';
import { LogNotifier } from '@/notifications/notifier';
import { LocalWorkoutRepository } from '@/state/repository';
import { MemoryKeyValueStore } from '@/state/storage';
import { makeCompletedSession } from '@/testing/fixtures';

describe('createApp', () => {
  it('runs a workout end to end on the memory backend', async () => {
    const ticker = new ManualTicker();
    let clock = new Date(2026, 9, 19, 7, 0);
    const app = await createApp(loadConfig({ STORAGE_BACKEND: 'memory', USER_ID: 'user-1' }), {
      provider: new MockGpsProvider(),
      ticker,
      notifier: new LogNotifier(() => 0),
      now: () => clock,
    });

    expect(app.streaks()).toEqual({ currentStreak: 0, longestStreak: 0, totalWorkouts: 0 });

    await app.session.start('running');
    ticker.tick(1200);
    clock = new Date(2026, 9, 19, 7, 20);
    app.session.end();
    await app.shutdown();

    expect(app.streaks()).toEqual({ currentStreak: 1, longestStreak: 1, totalWorkouts: 1 });
    expect(app.dailyGoal.isGoalReached()).toBe(true);
    expect(app.session.getCityProgress()?.totalProgress).toBe(1);
    expect(await app.repository.loadSessions()).toHaveLength(1);
  });

  it('loads history and city progress persisted by an earlier run', async () => {
    const store = new MemoryKeyValueStore();
    const earlier = new LocalWorkoutRepository(store);
    await earlier.appendSession(makeCompletedSession('yesterday', new Date(2026, 9, 18, 7)));
    await earlier.saveCityProgress({
      userId: 'user-1', totalProgress: 4, buildingsUnlocked: 4, currentLevel: 1, lastUpdated: null,
    });

    const app = await createApp(loadConfig({ STORAGE_BACKEND: 'memory' }), {
      store,
      provider: new MockGpsProvider(),
      ticker: new ManualTicker(),
      now: () => new Date(2026, 9, 19, 9, 0),
    });

    expect(app.history.size).toBe(1);
    expect(app.streaks()).toEqual({ currentStreak: 0, longestStreak: 1, totalWorkouts: 1 });
    expect(app.session.getCityProgress()?.totalProgress).toBe(4);
  });
});
