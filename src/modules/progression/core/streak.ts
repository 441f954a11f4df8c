/**
 * Learning streak over UTC calendar days.
 */

export interface StreakState {
  readonly learningStreak: number;
  readonly longestStreak: number;
  /** YYYY-MM-DD */
  readonly lastActivityDate: string | null;
}

const MS_PER_DAY = 1000 * 60 * 60 * 24;

/**
 * Extracts the UTC date (YYYY-MM-DD) from an ISO timestamp.
 */
export const utcDateOf = (isoTimestamp: string): string =>
  new Date(isoTimestamp).toISOString().slice(0, 10);

/**
 * Whole days from `from` to `to`, negative when `to` is earlier.
 */
const daysBetween = (from: string, to: string): number =>
  Math.round((Date.parse(to) - Date.parse(from)) / MS_PER_DAY);

/**
 * Records activity at `now`: same day keeps the streak, the next day extends
 * it and any gap restarts it at 1. Activity dated before the last one is ignored.
 */
export const updateStreak = (streak: StreakState, now: string): StreakState => {
  const activityDate = utcDateOf(now);

  // First activity ever
  if (streak.lastActivityDate === null) {
    return {
      learningStreak: 1,
      longestStreak: Math.max(streak.longestStreak, 1),
      lastActivityDate: activityDate,
    };
  }

  const daysDiff = daysBetween(streak.lastActivityDate, activityDate);

  if (daysDiff <= 0) {
    return streak;
  }

  if (daysDiff === 1) {
    const learningStreak = streak.learningStreak + 1;
    return {
      learningStreak,
      longestStreak: Math.max(streak.longestStreak, learningStreak),
      lastActivityDate: activityDate,
    };
  }

  return {
    learningStreak: 1,
    longestStreak: Math.max(streak.longestStreak, 1),
    lastActivityDate: activityDate,
  };
};
