/**
 * Catalog Module - Types
 *
 * Content file schemas (TypeBox) and the immutable domain model derived from them.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Highest star rating a single attempt can earn. */
export const MAX_STARS = 3;

export const FALLBACK_HINT =
  "Take your time and read each question carefully. Don't be afraid to experiment!";

// ─────────────────────────────────────────────────────────────────────────────
// Content File Schemas
// ─────────────────────────────────────────────────────────────────────────────

const SlugSchema = Type.String({ pattern: '^[a-z0-9][a-z0-9_-]*$', maxLength: 64 });

export const RewardAmountSchema = Type.Object(
  {
    coins: Type.Integer({ minimum: 0 }),
    xp: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false }
);

export const MultipleChoiceQuestionSchema = Type.Object(
  {
    text: Type.String({ minLength: 1 }),
    options: Type.Array(Type.String({ minLength: 1 }), { minItems: 2 }),
    correctIndex: Type.Integer({ minimum: 0 }),
    explanation: Type.String(),
  },
  { additionalProperties: false }
);

export const CodeQuestionSchema = Type.Object(
  {
    text: Type.String({ minLength: 1 }),
    starterCode: Type.Optional(Type.String()),
    expectedConcepts: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
    explanation: Type.String(),
  },
  { additionalProperties: false }
);

export const TopicSchema = Type.Object(
  {
    id: SlugSchema,
    title: Type.String({ minLength: 1 }),
    questions: Type.Array(MultipleChoiceQuestionSchema),
    hints: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  },
  { additionalProperties: false }
);

const PassingScoreSchema = Type.Number({ minimum: 0, maximum: 100 });

export const ProgressionSettingsSchema = Type.Object(
  {
    levelCount: Type.Integer({ minimum: 1, maximum: 1000 }),
    testEvery: Type.Integer({ minimum: 1 }),
    challengeEvery: Type.Integer({ minimum: 1 }),
    maxRetries: Type.Integer({ minimum: 1, maximum: 10 }),
    questionsPerLesson: Type.Integer({ minimum: 1, maximum: 20 }),
    questionsPerTest: Type.Integer({ minimum: 1, maximum: 20 }),
    topicQuestionsPerChallenge: Type.Integer({ minimum: 0, maximum: 20 }),
    passingScore: Type.Object(
      {
        lesson: PassingScoreSchema,
        test: PassingScoreSchema,
        challenge: PassingScoreSchema,
      },
      { additionalProperties: false }
    ),
    testBonus: RewardAmountSchema,
  },
  { additionalProperties: false }
);

export const PrerequisiteOverrideSchema = Type.Object(
  {
    levelId: Type.Integer({ minimum: 1 }),
    prerequisites: Type.Array(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false }
);

export const CourseFileSchema = Type.Object(
  {
    version: Type.Literal(1),
    title: Type.String({ minLength: 1 }),
    progression: ProgressionSettingsSchema,
    difficulties: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
    topics: Type.Array(TopicSchema, { minItems: 1 }),
    challenges: Type.Array(CodeQuestionSchema),
    /** Shown for levels whose topic has no hints of its own. */
    defaultHint: Type.Optional(Type.String({ minLength: 1 })),
    prerequisiteOverrides: Type.Optional(Type.Array(PrerequisiteOverrideSchema)),
  },
  { additionalProperties: false }
);

export type CourseFileDTO = Static<typeof CourseFileSchema>;
export type TopicDTO = Static<typeof TopicSchema>;
export type ProgressionSettings = Static<typeof ProgressionSettingsSchema>;

export const AchievementTierSchema = Type.Union([
  Type.Literal('bronze'),
  Type.Literal('silver'),
  Type.Literal('gold'),
  Type.Literal('platinum'),
]);

export const ComparatorSchema = Type.Union([
  Type.Literal('>='),
  Type.Literal('>'),
  Type.Literal('=='),
  Type.Literal('<='),
  Type.Literal('<'),
]);

/**
 * Conditions name a stat by string; whether the stat exists is decided
 * at evaluation time so one bad entry never blocks the whole table.
 */
export const AchievementConditionSchema = Type.Object(
  {
    stat: Type.String({ minLength: 1 }),
    comparator: ComparatorSchema,
    threshold: Type.Number(),
  },
  { additionalProperties: false }
);

export const AchievementDefinitionSchema = Type.Object(
  {
    id: SlugSchema,
    name: Type.String({ minLength: 1 }),
    description: Type.String(),
    icon: Type.String(),
    tier: AchievementTierSchema,
    hidden: Type.Optional(Type.Boolean()),
    condition: AchievementConditionSchema,
  },
  { additionalProperties: false }
);

export const AchievementsFileSchema = Type.Object(
  {
    version: Type.Literal(1),
    tiers: Type.Object(
      {
        bronze: RewardAmountSchema,
        silver: RewardAmountSchema,
        gold: RewardAmountSchema,
        platinum: RewardAmountSchema,
      },
      { additionalProperties: false }
    ),
    achievements: Type.Array(AchievementDefinitionSchema),
  },
  { additionalProperties: false }
);

export type AchievementsFileDTO = Static<typeof AchievementsFileSchema>;

export const ShopRewardCategorySchema = Type.Union([
  Type.Literal('power_up'),
  Type.Literal('cosmetic'),
  Type.Literal('convenience'),
]);

export const ShopRewardSchema = Type.Object(
  {
    id: SlugSchema,
    name: Type.String({ minLength: 1 }),
    description: Type.String(),
    cost: Type.Integer({ minimum: 1 }),
    category: ShopRewardCategorySchema,
  },
  { additionalProperties: false }
);

export const ShopFileSchema = Type.Object(
  {
    version: Type.Literal(1),
    rewards: Type.Array(ShopRewardSchema),
  },
  { additionalProperties: false }
);

export type ShopFileDTO = Static<typeof ShopFileSchema>;

/**
 * Everything read from the content directory, already schema-checked.
 */
export interface CatalogContent {
  course: CourseFileDTO;
  achievements: AchievementsFileDTO;
  shop: ShopFileDTO;
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain Model
// ─────────────────────────────────────────────────────────────────────────────

export type LevelKind = 'lesson' | 'test' | 'challenge';

export interface MultipleChoiceQuestion {
  readonly kind: 'multiple_choice';
  readonly text: string;
  readonly options: readonly string[];
  readonly correctIndex: number;
  readonly explanation: string;
}

export interface CodeQuestion {
  readonly kind: 'code';
  readonly text: string;
  readonly starterCode: string | null;
  /** Substrings that must all appear in a correct answer (case-insensitive). */
  readonly expectedConcepts: readonly string[];
  readonly explanation: string;
}

export type Question = MultipleChoiceQuestion | CodeQuestion;

export interface RewardAmount {
  readonly coins: number;
  readonly xp: number;
}

export interface LevelRewards extends RewardAmount {
  readonly stars: number;
}

export interface Level {
  readonly id: number;
  readonly kind: LevelKind;
  readonly title: string;
  readonly topicId: string;
  readonly topic: string;
  readonly difficulty: string;
  readonly questions: readonly Question[];
  readonly passingScore: number;
  readonly rewards: LevelRewards;
  /** Level ids that must be completed first. Always lower than `id`. */
  readonly prerequisites: readonly number[];
}

export type AchievementTier = Static<typeof AchievementTierSchema>;
export type Comparator = Static<typeof ComparatorSchema>;

export interface AchievementCondition {
  readonly stat: string;
  readonly comparator: Comparator;
  readonly threshold: number;
}

export interface AchievementDefinition {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly icon: string;
  readonly tier: AchievementTier;
  readonly hidden: boolean;
  readonly condition: AchievementCondition;
}

export type ShopRewardCategory = Static<typeof ShopRewardCategorySchema>;

export interface ShopReward {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly cost: number;
  readonly category: ShopRewardCategory;
}

export interface ProgressionRules {
  readonly maxRetries: number;
  /** Added on every pass of a test level; the retry cap bounds how often. */
  readonly testBonus: RewardAmount;
}

/**
 * Immutable content handle. Built once at startup and passed to every
 * component that needs level or achievement data.
 */
export interface GameCatalog {
  readonly title: string;
  readonly levels: readonly Level[];
  readonly levelsById: ReadonlyMap<number, Level>;
  readonly achievements: readonly AchievementDefinition[];
  readonly tierRewards: Readonly<Record<AchievementTier, RewardAmount>>;
  readonly shopRewards: readonly ShopReward[];
  readonly rules: ProgressionRules;
  /** Keyed by topic id. Topics without hints are absent. */
  readonly hintsByTopic: ReadonlyMap<string, readonly string[]>;
  readonly defaultHint: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Player-Facing Views
// ─────────────────────────────────────────────────────────────────────────────

export type QuestionView =
  | {
      readonly index: number;
      readonly kind: 'multiple_choice';
      readonly text: string;
      readonly options: readonly string[];
    }
  | {
      readonly index: number;
      readonly kind: 'code';
      readonly text: string;
      readonly starterCode: string | null;
    };

/** A level as shown to a player: answers are never included. */
export interface LevelView {
  readonly id: number;
  readonly kind: LevelKind;
  readonly title: string;
  readonly topic: string;
  readonly difficulty: string;
  readonly passingScore: number;
  readonly rewards: LevelRewards;
  readonly prerequisites: readonly number[];
  readonly questions: readonly QuestionView[];
}
