import type { RetryConfig } from '@/config';
import { logger as defaultLogger, type Logger } from './logger';

export interface RetryOptions extends RetryConfig {
  /** Names the operation in log lines */
  label: string;
  log?: Logger;
}

/** Wait before the attempt following `attempt` (0-based). */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** attempt;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, ms);
  });
}

/**
 * Run an operation up to `maxRetries` times, backing off after each
 * failure. Rejects with the error of the last attempt.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const log = (options.log ?? defaultLogger).child('retry');

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const failure = toError(error);
      if (attempt + 1 >= options.maxRetries) throw failure;

      const delayMs = backoffDelay(attempt, options.baseDelayMs);
      log.warn(`${options.label} failed, retrying`, {
        attempt: attempt + 1,
        maxRetries: options.maxRetries,
        delayMs,
        error: failure.message,
      });
      await sleep(delayMs);
    }
  }
}
