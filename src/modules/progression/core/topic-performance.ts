/**
 * Per-topic performance, rebuilt from the attempt history.
 */

import { getLevel } from '../../catalog/index.js';
import { roundScore } from '../../scoring/index.js';
import {
  TREND_MARGIN,
  TREND_RECENT_WINDOW,
  type PerformanceTrend,
  type TopicPerformance,
} from './types.js';

import type { GameCatalog } from '../../catalog/index.js';
import type { Player } from '../../players/index.js';

const mean = (values: readonly number[]): number =>
  values.reduce((sum, value) => sum + value, 0) / values.length;

/**
 * Compares the last few scores with everything before them. Needs at least
 * one score older than the recent window.
 */
export const trendOf = (scores: readonly number[]): PerformanceTrend => {
  const older = scores.slice(0, -TREND_RECENT_WINDOW);
  if (older.length === 0) {
    return 'insufficient_data';
  }

  const recentAverage = mean(scores.slice(-TREND_RECENT_WINDOW));
  const olderAverage = mean(older);

  if (recentAverage > olderAverage + TREND_MARGIN) {
    return 'improving';
  }
  if (recentAverage < olderAverage - TREND_MARGIN) {
    return 'declining';
  }
  return 'stable';
};

/**
 * One entry per topic the player has attempted, in order of first attempt.
 * Attempts on levels no longer in the catalog are left out.
 */
export const getTopicPerformance = (catalog: GameCatalog, player: Player): TopicPerformance[] => {
  const byTopic = new Map<string, { topic: string; scores: number[] }>();

  for (const record of player.performanceHistory) {
    const level = getLevel(catalog, record.levelId);
    if (level === null) {
      continue;
    }
    const entry = byTopic.get(level.topicId) ?? { topic: level.topic, scores: [] };
    entry.scores.push(record.scorePercentage);
    byTopic.set(level.topicId, entry);
  }

  return [...byTopic].map(([topicId, { topic, scores }]) => ({
    topicId,
    topic,
    attempts: scores.length,
    averageScore: roundScore(mean(scores)),
    bestScore: roundScore(Math.max(...scores)),
    trend: trendOf(scores),
  }));
};
