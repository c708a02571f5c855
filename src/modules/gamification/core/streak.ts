/**
 * Gamification Module - Daily Streak
 *
 * Streak arithmetic over local calendar days (YYYY-MM-DD).
 */

export interface DailyStreak {
  currentStreak: number;
  longestStreak: number;
  lastActiveDate: string | null;
}

const MS_PER_DAY = 1000 * 60 * 60 * 24;

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local calendar day (YYYY-MM-DD) of a timestamp.
 */
export function toIsoDate(date: Date): string {
  return `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Whole days between two ISO dates.
 */
function daysBetween(from: string, to: string): number {
  const diffMs = new Date(to).getTime() - new Date(from).getTime();
  return Math.round(diffMs / MS_PER_DAY);
}

/**
 * Registers activity on a day. Same-day activity leaves the streak unchanged.
 */
export function updateStreak(streak: DailyStreak, activityDate: string): DailyStreak {
  // First activity ever
  if (streak.lastActiveDate === null) {
    return {
      currentStreak: 1,
      longestStreak: Math.max(streak.longestStreak, 1),
      lastActiveDate: activityDate,
    };
  }

  const daysDiff = daysBetween(streak.lastActiveDate, activityDate);

  // Same day, or a date before the last one
  if (daysDiff <= 0) {
    return streak;
  }

  if (daysDiff === 1) {
    const newStreak = streak.currentStreak + 1;
    return {
      currentStreak: newStreak,
      longestStreak: Math.max(streak.longestStreak, newStreak),
      lastActiveDate: activityDate,
    };
  }

  // Gap in activity
  return {
    currentStreak: 1,
    longestStreak: Math.max(streak.longestStreak, 1),
    lastActiveDate: activityDate,
  };
}
