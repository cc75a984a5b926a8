import type { RunCategory } from '@/types';

/** Figures a classification rule looks at */
export interface RunFigures {
  durationMinutes: number;
  distanceKm: number;
  /** min/km, 0 when no distance was recorded */
  paceMinPerKm: number;
}

interface ClassificationRule {
  category: RunCategory;
  matches: (run: RunFigures) => boolean;
}

/**
 * Evaluated top to bottom, first match wins. The order is part of the
 * contract: a slow 35-minute run is a recovery run, not a long run.
 * A zero pace (no distance) fails every pace rule.
 */
const RULES: readonly ClassificationRule[] = [
  { category: 'sprint', matches: r => r.durationMinutes < 5 },
  { category: 'shortRun', matches: r => r.durationMinutes < 15 },
  { category: 'recoveryRun', matches: r => r.paceMinPerKm > 6.5 },
  { category: 'easyRun', matches: r => r.paceMinPerKm > 5.5 },
  { category: 'tempoRun', matches: r => r.paceMinPerKm > 4.5 },
  { category: 'longRun', matches: r => r.durationMinutes > 30 },
];

const FALLBACK: RunCategory = 'mediumRun';

export function runFigures(durationSeconds: number, distanceMeters: number): RunFigures {
  const durationMinutes = durationSeconds / 60;
  const distanceKm = distanceMeters / 1000;
  return {
    durationMinutes,
    distanceKm,
    paceMinPerKm: distanceKm > 0 ? durationMinutes / distanceKm : 0,
  };
}

/**
 * Classify a finished session by its duration and distance.
 */
export function classifyRun(durationSeconds: number, distanceMeters: number): RunCategory {
  const figures = runFigures(durationSeconds, distanceMeters);
  return RULES.find(rule => rule.matches(figures))?.category ?? FALLBACK;
}
