/**
 * Player record construction and small read helpers.
 */

import type { Player } from './types.js';

export interface NewPlayerInput {
  id: string;
  username: string;
  /** ISO timestamp */
  now: string;
}

/**
 * Creates a player with every field at its starting value.
 */
export const createPlayer = (input: NewPlayerInput): Player => ({
  id: input.id,
  username: input.username,
  createdAt: input.now,
  lastActiveAt: input.now,
  currentLevel: 1,
  completedLevels: [],
  levelAttempts: {},
  performanceHistory: [],
  totalXp: 0,
  totalCoins: 0,
  learningStreak: 0,
  longestStreak: 0,
  lastActivityDate: null,
  achievements: [],
  purchasedRewards: [],
});

export const getAttemptCount = (player: Player, levelId: number): number =>
  player.levelAttempts[String(levelId)] ?? 0;

export const hasCompletedLevel = (player: Player, levelId: number): boolean =>
  player.completedLevels.includes(levelId);

export const hasAchievement = (player: Player, achievementId: string): boolean =>
  player.achievements.some((earned) => earned.achievementId === achievementId);

/**
 * Clears all progression while keeping identity and purchased rewards.
 */
export const resetProgress = (player: Player, now: string): Player => ({
  ...player,
  lastActiveAt: now,
  currentLevel: 1,
  completedLevels: [],
  levelAttempts: {},
  performanceHistory: [],
  totalXp: 0,
  totalCoins: 0,
  learningStreak: 0,
  longestStreak: 0,
  lastActivityDate: null,
  achievements: [],
});
