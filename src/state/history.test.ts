import { describe, it, expect, vi } from 'vitest';
import { WorkoutHistory } from './history';
import { LocalWorkoutRepository, type WorkoutRepository } from './repository';
import { MemoryKeyValueStore } from './storage';
import { makeCompletedSession } from '@/testing/fixtures';
import { Logger } from '@/utils/logger';
import type { CityProgress, CompletedWorkoutSession, ProfileUpdate } from '@/types';

const RETRY = { maxRetries: 3, baseDelayMs: 1 };

/** Repository whose appends fail a given number of times first */
class FlakyRepository implements WorkoutRepository {
  readonly saved: CompletedWorkoutSession[] = [];
  attempts = 0;

  constructor(private failures: number) {}

  async loadSessions(): Promise<CompletedWorkoutSession[]> {
    return [...this.saved];
  }

  async appendSession(session: CompletedWorkoutSession): Promise<void> {
    this.attempts++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error('network unreachable');
    }
    this.saved.push(session);
  }

  async loadCityProgress(): Promise<CityProgress | null> {
    return null;
  }

  async saveCityProgress(): Promise<void> {}

  async loadProfile(): Promise<ProfileUpdate> {
    return {};
  }

  async updateProfile(): Promise<void> {}
}

const monday = (hour: number) => new Date(2026, 9, 19, hour);

describe('WorkoutHistory', () => {
  it('loads sessions sorted by start time', async () => {
    const repository = new LocalWorkoutRepository(new MemoryKeyValueStore());
    await repository.appendSession(makeCompletedSession('late', monday(18)));
    await repository.appendSession(makeCompletedSession('early', monday(7)));

    const history = new WorkoutHistory(repository, { retry: RETRY });
    await history.load();

    expect(history.getSessions().map(s => s.id)).toEqual(['early', 'late']);
  });

  it('starts empty when loading fails', async () => {
    const repository = new FlakyRepository(0);
    vi.spyOn(repository, 'loadSessions').mockRejectedValue(new Error('offline'));

    const history = new WorkoutHistory(repository, { retry: RETRY });
    await history.load();

    expect(history.size).toBe(0);
  });

  it('inserts appended sessions in start order', async () => {
    const history = new WorkoutHistory(new FlakyRepository(0), { retry: RETRY });
    await history.append(makeCompletedSession('noon', monday(12)));
    await history.append(makeCompletedSession('morning', monday(8)));
    await history.append(makeCompletedSession('evening', monday(19)));

    expect(history.getSessions().map(s => s.id)).toEqual(['morning', 'noon', 'evening']);
  });

  it('updates memory before the write completes', () => {
    const history = new WorkoutHistory(new FlakyRepository(0), { retry: RETRY });
    const write = history.append(makeCompletedSession('s1', monday(8)));

    expect(history.size).toBe(1);
    return expect(write).resolves.toBe(true);
  });

  it('retries a failed write', async () => {
    const repository = new FlakyRepository(2);
    const history = new WorkoutHistory(repository, { retry: RETRY });

    expect(await history.append(makeCompletedSession('s1', monday(8)))).toBe(true);
    expect(repository.attempts).toBe(3);
    expect(repository.saved.map(s => s.id)).toEqual(['s1']);
  });

  it('keeps the session in memory when every attempt fails', async () => {
    const repository = new FlakyRepository(10);
    const history = new WorkoutHistory(repository, { retry: RETRY });

    expect(await history.append(makeCompletedSession('s1', monday(8)))).toBe(false);
    expect(repository.attempts).toBe(3);
    expect(history.size).toBe(1);
  });

  it('times each write', async () => {
    const log = new Logger('history');
    const startTimer = vi.spyOn(log, 'startTimer');
    const history = new WorkoutHistory(new FlakyRepository(0), { retry: RETRY, log });

    await history.append(makeCompletedSession('s1', monday(8)));

    expect(startTimer).toHaveBeenCalledTimes(1);
    expect(startTimer).toHaveBeenCalledWith('Saving workout session');
  });

  it('writes queued sessions in order', async () => {
    const repository = new FlakyRepository(1);
    const history = new WorkoutHistory(repository, { retry: RETRY });

    void history.append(makeCompletedSession('first', monday(8)));
    void history.append(makeCompletedSession('second', monday(9)));
    await history.flush();

    expect(repository.saved.map(s => s.id)).toEqual(['first', 'second']);
  });
});
