import type { CompletedWorkoutSession } from '@/types';
import type { RetryConfig } from '@/config';
import { logger as defaultLogger, type Logger } from '@/utils/logger';
import { withRetry } from '@/utils/retry';
import type { WorkoutRepository } from './repository';

export interface WorkoutHistoryOptions {
  retry: RetryConfig;
  log?: Logger;
}

/**
 * Completed sessions ordered by start time. The in-memory list is the
 * source of truth for streaks; writes to the repository are queued
 * one after another and retried with backoff.
 */
export class WorkoutHistory {
  private sessions: CompletedWorkoutSession[] = [];
  private pending: Promise<void> = Promise.resolve();
  private readonly log: Logger;

  constructor(
    private readonly repository: WorkoutRepository,
    private readonly options: WorkoutHistoryOptions
  ) {
    this.log = options.log ?? defaultLogger.child('history');
  }

  /** Replace the in-memory list with what the repository holds. */
  async load(): Promise<void> {
    try {
      const loaded = await this.repository.loadSessions();
      this.sessions = [...loaded].sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
      this.log.debug('Loaded workout history', { sessions: this.sessions.length });
    } catch (error) {
      this.log.error('Failed to load workout history, starting empty', error);
      this.sessions = [];
    }
  }

  getSessions(): CompletedWorkoutSession[] {
    return [...this.sessions];
  }

  get size(): number {
    return this.sessions.length;
  }

  /**
   * Add a session. Memory is updated immediately; the returned promise
   * settles once the write finished (true) or gave up (false).
   */
  append(session: CompletedWorkoutSession): Promise<boolean> {
    let index = this.sessions.length;
    while (index > 0 && this.sessions[index - 1].startTime.getTime() > session.startTime.getTime()) {
      index--;
    }
    this.sessions.splice(index, 0, session);

    const write = this.pending.then(() => this.persist(session));
    this.pending = write.then(() => undefined);
    return write;
  }

  /** Resolves when every queued write has settled. */
  flush(): Promise<void> {
    return this.pending;
  }

  private async persist(session: CompletedWorkoutSession): Promise<boolean> {
    const timer = this.log.startTimer('Saving workout session');
    try {
      await withRetry(() => this.repository.appendSession(session), {
        ...this.options.retry,
        log: this.log,
        label: 'Saving workout session',
      });
      timer.end('debug', 'Workout session saved', { sessionId: session.id });
      return true;
    } catch (error) {
      this.log.error('Workout session could not be persisted', error, { sessionId: session.id });
      return false;
    }
  }
}
