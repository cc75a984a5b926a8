import type { CityProgress, CompletedWorkoutSession } from '@/types';

export interface CityRules {
  secondsPerProgressPoint: number;
  buildingsPerLevel: number;
}

export const DEFAULT_CITY_RULES: CityRules = {
  secondsPerProgressPoint: 15 * 60,
  buildingsPerLevel: 5,
};

/** One point of city progress per full block of workout time. */
export function progressEarned(durationSeconds: number, rules: CityRules = DEFAULT_CITY_RULES): number {
  return Math.floor(durationSeconds / rules.secondsPerProgressPoint);
}

export function levelFor(buildingsUnlocked: number, rules: CityRules = DEFAULT_CITY_RULES): number {
  return 1 + Math.floor(buildingsUnlocked / rules.buildingsPerLevel);
}

export function initialCityProgress(userId: string): CityProgress {
  return { userId, totalProgress: 0, buildingsUnlocked: 0, currentLevel: 1, lastUpdated: null };
}

/**
 * Credit a completed session to the city. Every progress point unlocks
 * a building; levels follow from the building count.
 */
export function applyWorkout(
  progress: CityProgress,
  session: CompletedWorkoutSession,
  rules: CityRules = DEFAULT_CITY_RULES
): CityProgress {
  const totalProgress = progress.totalProgress + progressEarned(session.durationSeconds, rules);
  return {
    userId: progress.userId,
    totalProgress,
    buildingsUnlocked: totalProgress,
    currentLevel: levelFor(totalProgress, rules),
    lastUpdated: session.endTime,
  };
}
