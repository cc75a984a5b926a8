/** Streak celebration templates; {n} is replaced with the streak length */
export const STREAK_TEMPLATES: readonly string[] = [
  '🔥 {n}-day streak! You are on fire!',
  '💪 {n} days strong! Keep it up!',
  '🏆 {n} days in a row! Nothing can stop you now!',
  '⚡ {n}-day streak! You are crushing it!',
  '🌟 {n} days! The city is growing because of you!',
];

export const MORNING_REMINDERS: readonly string[] = [
  'Rise and move. Fifteen minutes today keeps the streak alive.',
  'Your city needs builders. Lace up and lay a brick.',
  'Coffee first, cardio second. The streak is waiting.',
  'One short session before the day gets away from you.',
];

export const EVENING_REMINDERS: readonly string[] = [
  'Still time to get today counted. Even a walk will do.',
  'The streak does not save itself. Fifteen minutes, then rest.',
  'Your couch will still be there after a quick session.',
  'Missed the morning? Evening workouts count just the same.',
];
