/**
 * Command-line driver: runs one simulated workout and prints its summary.
 *
 * Usage: npm start -- [seconds] [running|walking|cycling|cardio]
 */

import { loadConfig } from '@/config';
import { isWorkoutType, RUN_CATEGORY_LABELS } from '@/constants';
import { createApp } from '@/app';
import { calculatePace } from '@/gps/geo-math';
import { formatDailyTitle, formatDistanceKm, formatPace, formatPercent, formatWorkoutTime } from '@/utils/format';
import { logger } from '@/utils/logger';

async function main(argv: string[]): Promise<void> {
  const seconds = Number.parseInt(argv[0] ?? '30', 10);
  const type = argv[1] ?? 'running';
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new TypeError(`Invalid duration: "${argv[0] ?? ''}"`);
  }
  if (!isWorkoutType(type)) {
    throw new TypeError(`Unknown workout type: "${type}"`);
  }

  const app = await createApp(loadConfig());
  logger.info(formatDailyTitle(app.streaks().currentStreak));

  await app.session.start(type);
  await new Promise(resolve => setTimeout(resolve, seconds * 1000));
  const completed = app.session.end();
  await app.shutdown();

  if (!completed) return;

  const streaks = app.streaks();
  logger.info('Workout summary', {
    duration: formatWorkoutTime(completed.durationSeconds),
    distance: formatDistanceKm(completed.distanceMeters),
    pace: formatPace(calculatePace(completed.distanceMeters, completed.durationSeconds)),
    calories: completed.caloriesBurned,
    category: RUN_CATEGORY_LABELS[completed.runCategory],
    currentStreak: streaks.currentStreak,
    longestStreak: streaks.longestStreak,
    totalWorkouts: streaks.totalWorkouts,
    dailyGoal: formatPercent(app.dailyGoal.progressRatio()),
  });
}

main(process.argv.slice(2)).catch((error: unknown) => {
  logger.error('Workout run failed', error);
  process.exitCode = 1;
});
