/**
 * Progression REST API Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { AchievementProgressSchema } from '../../../achievements/shell/rest/schemas.js';
import { AttemptRecordSchema } from '../../../players/shell/rest/schemas.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

/** Upper bound on answers per submission. */
export const MAX_ANSWERS = 50;

/** Upper bound on code answer length, in characters. */
export const MAX_CODE_ANSWER_LENGTH = 20_000;

export const SubmitAttemptBodySchema = Type.Object(
  {
    answers: Type.Array(
      Type.Union([
        Type.Integer({ minimum: 0, description: 'Option index for a multiple-choice question' }),
        Type.String({ maxLength: MAX_CODE_ANSWER_LENGTH, description: 'Source for a code question' }),
      ]),
      { maxItems: MAX_ANSWERS }
    ),
    timeTakenSeconds: Type.Optional(Type.Number({ minimum: 0 })),
  },
  { additionalProperties: false }
);

export type SubmitAttemptBody = Static<typeof SubmitAttemptBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const RewardsSchema = Type.Object({
  stars: Type.Integer(),
  coins: Type.Integer(),
  xp: Type.Integer(),
});

export const LevelMapEntrySchema = Type.Object({
  id: Type.Integer(),
  kind: Type.String(),
  title: Type.String(),
  topic: Type.String(),
  difficulty: Type.String(),
  completed: Type.Boolean(),
  unlocked: Type.Boolean(),
  state: Type.String(),
  stars: Type.Integer(),
  attempts: Type.Integer(),
  attemptsRemaining: Type.Integer(),
  passingScore: Type.Number(),
  rewards: RewardsSchema,
});

export const LevelMapResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(LevelMapEntrySchema),
});

const QuestionViewSchema = Type.Object({
  index: Type.Integer(),
  kind: Type.String(),
  text: Type.String(),
  options: Type.Optional(Type.Array(Type.String())),
  starterCode: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export const LevelViewSchema = Type.Object({
  id: Type.Integer(),
  kind: Type.String(),
  title: Type.String(),
  topic: Type.String(),
  difficulty: Type.String(),
  passingScore: Type.Number(),
  rewards: RewardsSchema,
  prerequisites: Type.Array(Type.Integer()),
  questions: Type.Array(QuestionViewSchema),
});

export const PlayerLevelResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    level: LevelViewSchema,
    progress: LevelMapEntrySchema,
  }),
});

const QuestionResultSchema = Type.Object({
  index: Type.Integer(),
  kind: Type.String(),
  correct: Type.Boolean(),
  explanation: Type.String(),
  missingConcepts: Type.Optional(Type.Array(Type.String())),
  syntaxError: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

const NewAchievementSchema = Type.Object({
  achievementId: Type.String(),
  name: Type.String(),
  tier: Type.String(),
  coins: Type.Integer(),
  xp: Type.Integer(),
  earnedAt: Type.String(),
});

export const SubmitAttemptResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    success: Type.Literal(true),
    levelId: Type.Integer(),
    passed: Type.Boolean(),
    scorePercentage: Type.Number(),
    correctCount: Type.Integer(),
    totalQuestions: Type.Integer(),
    questions: Type.Array(QuestionResultSchema),
    starsEarned: Type.Integer(),
    coinsEarned: Type.Integer(),
    xpEarned: Type.Integer(),
    newAchievements: Type.Array(NewAchievementSchema),
    nextLevelUnlocked: Type.Union([Type.Integer(), Type.Null()]),
    attemptNumber: Type.Integer(),
    attemptsRemaining: Type.Integer(),
    newBestScore: Type.Boolean(),
    playerLevel: Type.Integer(),
    leveledUp: Type.Boolean(),
    feedback: Type.Object({
      tone: Type.String(),
      message: Type.String(),
    }),
    totals: Type.Object({
      totalXp: Type.Integer(),
      totalCoins: Type.Integer(),
      learningStreak: Type.Integer(),
    }),
  }),
});

/**
 * Failure of a graded attempt that could not be saved: the score is still reported.
 */
export const ProgressNotSavedResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
  scorePercentage: Type.Optional(Type.Number()),
  passed: Type.Optional(Type.Boolean()),
});

export const LevelHintResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    levelId: Type.Integer(),
    topic: Type.String(),
    hint: Type.String(),
  }),
});

const TopicPerformanceSchema = Type.Object({
  topicId: Type.String(),
  topic: Type.String(),
  attempts: Type.Integer(),
  averageScore: Type.Number(),
  bestScore: Type.Number(),
  trend: Type.String(),
});

const RecommendationSchema = Type.Object({
  levelId: Type.Integer(),
  title: Type.String(),
  kind: Type.String(),
  difficulty: Type.String(),
  score: Type.Integer(),
  reasons: Type.Array(Type.String()),
});

export const DashboardResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    player: Type.Object({
      id: Type.String(),
      username: Type.String(),
      currentLevel: Type.Integer(),
      playerLevel: Type.Integer(),
      totalXp: Type.Integer(),
      totalCoins: Type.Integer(),
      learningStreak: Type.Integer(),
      longestStreak: Type.Integer(),
    }),
    nextLevel: Type.Union([LevelMapEntrySchema, Type.Null()]),
    recommendations: Type.Array(RecommendationSchema),
    progress: Type.Object({
      completedLevels: Type.Integer(),
      totalLevels: Type.Integer(),
      progressPercentage: Type.Number(),
      totalStars: Type.Integer(),
      maxPossibleStars: Type.Integer(),
    }),
    recentAttempts: Type.Array(AttemptRecordSchema),
    topicPerformance: Type.Array(TopicPerformanceSchema),
    achievements: Type.Array(AchievementProgressSchema),
  }),
});
