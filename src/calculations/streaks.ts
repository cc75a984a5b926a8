import { differenceInCalendarDays, format, isSameWeek, startOfDay, subDays } from 'date-fns';
import type { ProfileUpdate, StreakMetrics, WorkoutSession } from '@/types';

function dayKey(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

function completedDays(history: readonly WorkoutSession[]): Set<string> {
  const days = new Set<string>();
  for (const session of history) {
    if (session.isCompleted) days.add(dayKey(session.startTime));
  }
  return days;
}

/**
 * Consecutive calendar days with a completed session, counting back
 * from today. Zero when today has none.
 */
export function currentStreak(history: readonly WorkoutSession[], now: Date): number {
  const days = completedDays(history);
  let streak = 0;
  let day = startOfDay(now);
  while (days.has(dayKey(day))) {
    streak++;
    day = subDays(day, 1);
  }
  return streak;
}

/**
 * Longest run of consecutive calendar days with a completed session.
 * Sessions are coalesced per day first, so a second session on the
 * same day neither extends nor breaks the run.
 */
export function longestStreak(history: readonly WorkoutSession[]): number {
  const days = [...completedDays(history)]
    .sort()
    .map(key => startOfDay(new Date(`${key}T00:00:00`)));

  let longest = 0;
  let running = 0;
  let previous: Date | null = null;
  for (const day of days) {
    running = previous && differenceInCalendarDays(day, previous) === 1 ? running + 1 : 1;
    longest = Math.max(longest, running);
    previous = day;
  }
  return longest;
}

export function totalCompletedWorkouts(history: readonly WorkoutSession[]): number {
  return history.filter(s => s.isCompleted).length;
}

export function computeStreakMetrics(history: readonly WorkoutSession[], now: Date): StreakMetrics {
  return {
    currentStreak: currentStreak(history, now),
    longestStreak: longestStreak(history),
    totalWorkouts: totalCompletedWorkouts(history),
  };
}

/**
 * Counters to store after one more workout on `sessionDay`. `computed`
 * may come from a window of recent sessions only, so stored counters
 * are never lowered: the total grows by one and a stored streak that
 * ended the day before carries on.
 */
export function nextProfileCounters(
  computed: StreakMetrics,
  stored: ProfileUpdate,
  sessionDay: Date
): StreakMetrics {
  let carried = 0;
  if (stored.currentStreak !== undefined && stored.lastWorkoutDate !== undefined) {
    const gap = differenceInCalendarDays(sessionDay, stored.lastWorkoutDate);
    if (gap === 0) carried = stored.currentStreak;
    else if (gap === 1) carried = stored.currentStreak + 1;
  }

  const streak = Math.max(computed.currentStreak, carried);
  return {
    currentStreak: streak,
    longestStreak: Math.max(computed.longestStreak, stored.longestStreak ?? 0, streak),
    totalWorkouts: Math.max(computed.totalWorkouts, (stored.totalWorkouts ?? 0) + 1),
  };
}

/**
 * Completed sessions per weekday (Sunday first) in the week containing `now`.
 */
export function weeklyActivity(history: readonly WorkoutSession[], now: Date): number[] {
  const counts = [0, 0, 0, 0, 0, 0, 0];
  for (const session of history) {
    if (session.isCompleted && isSameWeek(session.startTime, now)) {
      counts[session.startTime.getDay()]++;
    }
  }
  return counts;
}

