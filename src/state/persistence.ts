import type { z } from 'zod';
import type { Logger } from '@/utils/logger';
import type { KeyValueStore } from './storage';

/** Logical keys of the local store */
export const STORAGE_KEYS = {
  history: 'workoutHistory',
  dailyGoal: 'dailyGoalProgress',
  cityProgress: 'cityProgress',
  profile: 'userProfile',
} as const;

/**
 * Load and validate a JSON value. Missing, unreadable or malformed data
 * all come back as null; only the last two are logged.
 */
export async function loadJson<S extends z.ZodTypeAny>(
  store: KeyValueStore,
  key: string,
  schema: S,
  log?: Logger
): Promise<z.output<S> | null> {
  let raw: string | null;
  try {
    raw = await store.getItem(key);
  } catch (error) {
    log?.error(`Failed to read "${key}"`, error);
    return null;
  }
  if (raw === null) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    log?.warn(`Discarding unparseable "${key}"`, { error: error instanceof Error ? error.message : String(error) });
    return null;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    log?.warn(`Discarding invalid "${key}"`, { issues: result.error.issues.map(i => i.message) });
    return null;
  }
  return result.data;
}

/** Serialize a value as JSON under the given key. */
export async function saveJson(store: KeyValueStore, key: string, value: unknown): Promise<void> {
  await store.setItem(key, JSON.stringify(value));
}
