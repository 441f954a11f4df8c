/**
 * Stats snapshot for achievement conditions, computed from the player record.
 */

import {
  EARLY_HOUR,
  FAST_COMPLETION_SECONDS,
  NIGHT_END_HOUR,
  NIGHT_START_HOUR,
  type StatsSnapshot,
} from './types.js';

import type { LevelKind } from '../../catalog/index.js';
import type { AttemptRecord, Player } from '../../players/index.js';

const utcHourOf = (record: AttemptRecord): number => new Date(record.occurredAt).getUTCHours();

const isNightHour = (hour: number): boolean => hour >= NIGHT_START_HOUR || hour < NIGHT_END_HOUR;

const distinctPassed = (history: readonly AttemptRecord[], kind: LevelKind): number =>
  new Set(history.filter((r) => r.passed && r.levelKind === kind).map((r) => r.levelId)).size;

export const computeStatsSnapshot = (player: Player): StatsSnapshot => {
  const history = player.performanceHistory;
  const passed = history.filter((record) => record.passed);

  const totalSeconds = history.reduce((sum, record) => sum + (record.timeTakenSeconds ?? 0), 0);

  return {
    levels_completed: player.completedLevels.length,
    perfect_scores: history.filter((record) => record.scorePercentage >= 100).length,
    learning_streak: player.learningStreak,
    total_time_hours: totalSeconds / 3600,
    fast_completion_count: passed.filter(
      (record) => record.timeTakenSeconds !== null && record.timeTakenSeconds < FAST_COMPLETION_SECONDS
    ).length,
    challenge_levels_completed: distinctPassed(history, 'challenge'),
    tests_completed: distinctPassed(history, 'test'),
    night_completions: passed.filter((record) => isNightHour(utcHourOf(record))).length,
    early_completions: passed.filter((record) => utcHourOf(record) === EARLY_HOUR).length,
    total_xp: player.totalXp,
  };
};
