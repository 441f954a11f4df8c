/**
 * Players REST API Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { MAX_LEADERBOARD_LIMIT, USERNAME_PATTERN } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const RegisterPlayerBodySchema = Type.Object(
  {
    username: Type.String({
      pattern: USERNAME_PATTERN,
      description: 'Letters, digits, underscore or dash; 3 to 32 characters',
    }),
  },
  { additionalProperties: false }
);

export type RegisterPlayerBody = Static<typeof RegisterPlayerBodySchema>;

export const LeaderboardQuerySchema = Type.Object(
  {
    limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_LEADERBOARD_LIMIT })),
  },
  { additionalProperties: false }
);

export type LeaderboardQuery = Static<typeof LeaderboardQuerySchema>;

export const AdminHeadersSchema = Type.Object({
  'x-admin-key': Type.Optional(Type.String()),
});

export type AdminHeaders = Static<typeof AdminHeadersSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const LevelKindSchema = Type.Union([
  Type.Literal('lesson'),
  Type.Literal('test'),
  Type.Literal('challenge'),
]);

export const AttemptRecordSchema = Type.Object({
  levelId: Type.Integer(),
  levelKind: LevelKindSchema,
  scorePercentage: Type.Number(),
  passed: Type.Boolean(),
  stars: Type.Integer(),
  attemptNumber: Type.Integer(),
  occurredAt: Type.String(),
  timeTakenSeconds: Type.Union([Type.Number(), Type.Null()]),
});

export const EarnedAchievementSchema = Type.Object({
  achievementId: Type.String(),
  tier: Type.String(),
  earnedAt: Type.String(),
  coins: Type.Integer(),
  xp: Type.Integer(),
});

export const PlayerSchema = Type.Object({
  id: Type.String(),
  username: Type.String(),
  createdAt: Type.String(),
  lastActiveAt: Type.String(),
  currentLevel: Type.Integer(),
  completedLevels: Type.Array(Type.Integer()),
  levelAttempts: Type.Record(Type.String(), Type.Integer()),
  performanceHistory: Type.Array(AttemptRecordSchema),
  totalXp: Type.Integer(),
  totalCoins: Type.Integer(),
  learningStreak: Type.Integer(),
  longestStreak: Type.Integer(),
  lastActivityDate: Type.Union([Type.String(), Type.Null()]),
  achievements: Type.Array(EarnedAchievementSchema),
  purchasedRewards: Type.Array(Type.String()),
});

export const PlayerStatsSchema = Type.Object({
  levelsCompleted: Type.Integer(),
  totalLevels: Type.Integer(),
  progressPercentage: Type.Number(),
  levelStars: Type.Record(Type.String(), Type.Integer()),
  totalStars: Type.Integer(),
  averageScore: Type.Number(),
  perfectScores: Type.Integer(),
  totalAttempts: Type.Integer(),
  achievementsCount: Type.Integer(),
  playerLevel: Type.Integer(),
});

export const RegisterPlayerResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: PlayerSchema,
});

export const PlayerProfileResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    player: PlayerSchema,
    stats: PlayerStatsSchema,
  }),
});

export const LeaderboardEntrySchema = Type.Object({
  rank: Type.Integer(),
  playerId: Type.String(),
  username: Type.String(),
  totalXp: Type.Integer(),
  playerLevel: Type.Integer(),
  levelsCompleted: Type.Integer(),
  achievementsCount: Type.Integer(),
});

export const LeaderboardResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(LeaderboardEntrySchema),
});
