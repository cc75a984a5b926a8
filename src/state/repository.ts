import type { CityProgress, CompletedWorkoutSession, ProfileUpdate } from '@/types';
import type { Logger } from '@/utils/logger';
import { CityProgressSchema, HistorySchema, ProfileSchema } from './schemas';
import { STORAGE_KEYS, loadJson, saveJson } from './persistence';
import type { KeyValueStore } from './storage';

/** Storage contract the tracking engine depends on */
export interface WorkoutRepository {
  loadSessions(): Promise<CompletedWorkoutSession[]>;
  appendSession(session: CompletedWorkoutSession): Promise<void>;
  loadCityProgress(): Promise<CityProgress | null>;
  saveCityProgress(progress: CityProgress): Promise<void>;
  /** Stored profile fields, empty when no profile exists yet */
  loadProfile(): Promise<ProfileUpdate>;
  updateProfile(update: ProfileUpdate): Promise<void>;
}

/**
 * Repository over a local key-value store. History is kept as one
 * JSON array; unreadable data is treated as absent.
 */
export class LocalWorkoutRepository implements WorkoutRepository {
  constructor(
    private readonly store: KeyValueStore,
    private readonly log?: Logger
  ) {}

  async loadSessions(): Promise<CompletedWorkoutSession[]> {
    return (await loadJson(this.store, STORAGE_KEYS.history, HistorySchema, this.log)) ?? [];
  }

  async appendSession(session: CompletedWorkoutSession): Promise<void> {
    const sessions = await this.loadSessions();
    if (sessions.some(s => s.id === session.id)) return;
    sessions.push(session);
    await saveJson(this.store, STORAGE_KEYS.history, sessions);
  }

  async loadCityProgress(): Promise<CityProgress | null> {
    return loadJson(this.store, STORAGE_KEYS.cityProgress, CityProgressSchema, this.log);
  }

  async saveCityProgress(progress: CityProgress): Promise<void> {
    await saveJson(this.store, STORAGE_KEYS.cityProgress, progress);
  }

  async updateProfile(update: ProfileUpdate): Promise<void> {
    const current = (await loadJson(this.store, STORAGE_KEYS.profile, ProfileSchema, this.log)) ?? {};
    await saveJson(this.store, STORAGE_KEYS.profile, { ...current, ...update });
  }

  async loadProfile(): Promise<ProfileUpdate> {
    return (await loadJson(this.store, STORAGE_KEYS.profile, ProfileSchema, this.log)) ?? {};
  }
}
