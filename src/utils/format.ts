/**
 * Format workout time as h:mm:ss or mm:ss
 * @param seconds - Time in seconds
 * @returns Formatted time string
 */
export function formatWorkoutTime(seconds: number): string {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
  }
  return `${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
}

/**
 * Format pace as m:ss/km, or "--:--" when there is no pace yet
 * @param secPerKm - Pace in seconds per km
 */
export function formatPace(secPerKm: number | null): string {
  if (secPerKm === null || !Number.isFinite(secPerKm)) return '--:--';
  const minutes = Math.floor(secPerKm / 60);
  const seconds = Math.floor(secPerKm % 60);
  return `${minutes}:${String(seconds).padStart(2, '0')}/km`;
}

/** Format meters as kilometers with two decimals */
export function formatDistanceKm(meters: number): string {
  return `${(meters / 1000).toFixed(2)} km`;
}

/** Format a 0..1 ratio as a whole percentage */
export function formatPercent(ratio: number): string {
  return `${Math.floor(ratio * 100)}%`;
}

function ordinalSuffix(day: number): string {
  if (day % 100 >= 11 && day % 100 <= 13) return 'TH';
  switch (day % 10) {
    case 1: return 'ST';
    case 2: return 'ND';
    case 3: return 'RD';
    default: return 'TH';
  }
}

/**
 * Headline for today's goal card: today is day streak + 1.
 * @example formatDailyTitle(1) // "2ND DAILY RUN"
 */
export function formatDailyTitle(currentStreak: number): string {
  const day = currentStreak + 1;
  return `${day}${ordinalSuffix(day)} DAILY RUN`;
}
