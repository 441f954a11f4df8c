import { describe, expect, it } from 'vitest';

import { updateStreak, utcDateOf, type StreakState } from '@/modules/progression/index.js';

const state = (
  learningStreak: number,
  longestStreak: number,
  lastActivityDate: string | null
): StreakState => ({
  learningStreak,
  longestStreak,
  lastActivityDate,
});

describe('utcDateOf', () => {
  it('takes the UTC calendar date', () => {
    expect(utcDateOf('2024-03-04T23:59:59.000Z')).toBe('2024-03-04');
    expect(utcDateOf('2024-03-04T23:30:00-02:00')).toBe('2024-03-05');
  });
});

describe('updateStreak', () => {
  it('starts at 1 on the first activity', () => {
    expect(updateStreak(state(0, 0, null), '2024-03-04T10:00:00.000Z')).toEqual(
      state(1, 1, '2024-03-04')
    );
  });

  it('keeps the streak on a second activity the same day', () => {
    const current = state(3, 5, '2024-03-04');

    expect(updateStreak(current, '2024-03-04T22:00:00.000Z')).toBe(current);
  });

  it('extends the streak on the next day and raises the longest', () => {
    expect(updateStreak(state(5, 5, '2024-03-03'), '2024-03-04T10:00:00.000Z')).toEqual(
      state(6, 6, '2024-03-04')
    );
  });

  it('counts consecutive days, not 24 hour periods', () => {
    expect(updateStreak(state(2, 4, '2024-03-03'), '2024-03-04T00:30:00.000Z')).toEqual(
      state(3, 4, '2024-03-04')
    );
  });

  it('restarts at 1 after a gap and keeps the longest', () => {
    expect(updateStreak(state(6, 9, '2024-03-01'), '2024-03-04T10:00:00.000Z')).toEqual(
      state(1, 9, '2024-03-04')
    );
  });

  it('ignores activity dated before the last one', () => {
    const current = state(2, 2, '2024-03-04');

    expect(updateStreak(current, '2024-03-02T10:00:00.000Z')).toBe(current);
  });

  it('crosses month boundaries', () => {
    expect(updateStreak(state(1, 1, '2024-02-29'), '2024-03-01T08:00:00.000Z')).toEqual(
      state(2, 2, '2024-03-01')
    );
  });
});
