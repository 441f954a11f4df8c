/**
 * Catalog derivation.
 *
 * Turns the schema-checked content files into the immutable level table.
 * Level kind, difficulty, rewards, prerequisites and question selection are
 * all functions of the level id, so the same content always yields the same
 * catalog.
 */

import type { CatalogIssue } from './errors.js';
import type {
  AchievementDefinition,
  CatalogContent,
  CodeQuestion,
  GameCatalog,
  Level,
  LevelKind,
  MultipleChoiceQuestion,
  ProgressionSettings,
  Question,
  RewardAmount,
  ShopReward,
  TopicDTO,
} from './types.js';
import { FALLBACK_HINT, MAX_STARS } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Derivation Rules
// ─────────────────────────────────────────────────────────────────────────────

/** Lessons share a topic in runs of this many consecutive ids. */
const LEVELS_PER_TOPIC = 3;

/** Difficulty steps up every this many ids. */
const LEVELS_PER_DIFFICULTY = 15;

/** How many preceding ids a test or challenge requires. */
const PREREQUISITE_WINDOW: Record<Exclude<LevelKind, 'lesson'>, number> = {
  test: 5,
  challenge: 10,
};

const REWARD_MULTIPLIERS: Record<LevelKind, RewardAmount> = {
  lesson: { coins: 1, xp: 1 },
  test: { coins: 2, xp: 3 },
  challenge: { coins: 3, xp: 4 },
};

export const levelKindFor = (id: number, settings: ProgressionSettings): LevelKind => {
  if (id % settings.challengeEvery === 0) {
    return 'challenge';
  }
  if (id % settings.testEvery === 0) {
    return 'test';
  }
  return 'lesson';
};

export const baseRewardsFor = (id: number): RewardAmount => ({
  coins: 20 + Math.floor(id / 10) * 5,
  xp: 50 + Math.floor(id / 5) * 10,
});

export const rewardsFor = (id: number, kind: LevelKind): RewardAmount => {
  const base = baseRewardsFor(id);
  const multiplier = REWARD_MULTIPLIERS[kind];
  return { coins: base.coins * multiplier.coins, xp: base.xp * multiplier.xp };
};

const range = (from: number, toExclusive: number): number[] =>
  Array.from({ length: Math.max(0, toExclusive - from) }, (_, i) => from + i);

export const prerequisitesFor = (id: number, kind: LevelKind): number[] => {
  if (id === 1) {
    return [];
  }
  if (kind === 'lesson') {
    return [id - 1];
  }
  return range(Math.max(1, id - PREREQUISITE_WINDOW[kind]), id);
};

export const difficultyIndexFor = (id: number, kind: LevelKind, tierCount: number): number => {
  const base = Math.min(Math.floor((id - 1) / LEVELS_PER_DIFFICULTY), tierCount - 1);
  return kind === 'challenge' ? Math.min(base + 1, tierCount - 1) : base;
};

export const topicIndexFor = (id: number, topicCount: number): number =>
  Math.floor((id - 1) / LEVELS_PER_TOPIC) % topicCount;

// ─────────────────────────────────────────────────────────────────────────────
// Question Selection
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Takes up to `count` questions from a bank, starting at `offset` and wrapping.
 */
const rotate = <T>(bank: readonly T[], offset: number, count: number): T[] => {
  if (bank.length === 0) {
    return [];
  }
  const take = Math.min(count, bank.length);
  return Array.from({ length: take }, (_, i) => bank[(offset + i) % bank.length]).filter(
    (q): q is T => q !== undefined
  );
};

/**
 * One question per topic per round until `count` is reached or every bank is used up.
 */
const roundRobin = <T>(banks: readonly (readonly T[])[], count: number): T[] => {
  const selected: T[] = [];
  const longest = Math.max(0, ...banks.map((bank) => bank.length));

  for (let round = 0; round < longest && selected.length < count; round++) {
    for (const bank of banks) {
      const question = bank[round];
      if (question !== undefined && selected.length < count) {
        selected.push(question);
      }
    }
  }

  return selected;
};

interface TopicBank {
  id: string;
  title: string;
  questions: MultipleChoiceQuestion[];
  hints: string[];
}

const toTopicBanks = (topics: readonly TopicDTO[], issues: CatalogIssue[]): TopicBank[] => {
  const seen = new Set<string>();
  const banks: TopicBank[] = [];

  for (const topic of topics) {
    if (seen.has(topic.id)) {
      issues.push({
        type: 'DuplicateTopicId',
        message: `Topic '${topic.id}' is defined more than once; later definitions are ignored`,
        topicId: topic.id,
      });
      continue;
    }
    seen.add(topic.id);

    const questions: MultipleChoiceQuestion[] = [];
    topic.questions.forEach((question, questionIndex) => {
      if (question.correctIndex >= question.options.length) {
        issues.push({
          type: 'InvalidCorrectIndex',
          message: `Question ${String(questionIndex)} of topic '${topic.id}' points at option ${String(question.correctIndex)} but has ${String(question.options.length)} options`,
          topicId: topic.id,
          questionIndex,
        });
        return;
      }
      questions.push({ kind: 'multiple_choice', ...question });
    });

    banks.push({ id: topic.id, title: topic.title, questions, hints: topic.hints ?? [] });
  }

  return banks;
};

// ─────────────────────────────────────────────────────────────────────────────
// Catalog Builder
// ─────────────────────────────────────────────────────────────────────────────

export interface BuildCatalogResult {
  catalog: GameCatalog;
  issues: CatalogIssue[];
}

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

/**
 * Builds the immutable catalog from content files.
 * Never fails: content problems are returned as issues and the affected
 * levels, achievements or rewards are left out.
 */
export const buildCatalog = (content: CatalogContent): BuildCatalogResult => {
  const { course } = content;
  const settings = course.progression;
  const issues: CatalogIssue[] = [];

  const banks = toTopicBanks(course.topics, issues);
  const challenges: CodeQuestion[] = course.challenges.map((challenge) => ({
    kind: 'code',
    text: challenge.text,
    starterCode: challenge.starterCode ?? null,
    expectedConcepts: challenge.expectedConcepts,
    explanation: challenge.explanation,
  }));

  const overrides = new Map<number, number[]>(
    (course.prerequisiteOverrides ?? []).map((o) => [o.levelId, o.prerequisites])
  );

  const bankFor = (id: number): TopicBank | undefined =>
    banks[topicIndexFor(id, Math.max(1, banks.length))];

  const selectQuestions = (id: number, kind: LevelKind, prerequisites: number[]): Question[] => {
    const position = (id - 1) % LEVELS_PER_TOPIC;
    const own = bankFor(id)?.questions ?? [];

    switch (kind) {
      case 'lesson':
        return rotate(own, position, settings.questionsPerLesson);
      case 'test': {
        const windowBanks: MultipleChoiceQuestion[][] = [];
        const seenTopics = new Set<string>();
        for (const prerequisiteId of prerequisites) {
          const bank = bankFor(prerequisiteId);
          if (bank !== undefined && !seenTopics.has(bank.id)) {
            seenTopics.add(bank.id);
            windowBanks.push(bank.questions);
          }
        }
        return roundRobin(windowBanks, settings.questionsPerTest);
      }
      case 'challenge': {
        const ordinal = Math.floor(id / settings.challengeEvery) - 1;
        const code = rotate(challenges, ordinal, 1);
        return [...rotate(own, position, settings.topicQuestionsPerChallenge), ...code];
      }
    }
  };

  const levels: Level[] = [];

  for (let id = 1; id <= settings.levelCount; id++) {
    const kind = levelKindFor(id, settings);
    const prerequisites = overrides.get(id) ?? prerequisitesFor(id, kind);

    const invalid = prerequisites.find((p) => p >= id);
    if (invalid !== undefined) {
      issues.push({
        type: 'InvalidPrerequisite',
        message: `Level ${String(id)} requires level ${String(invalid)}, which does not come before it`,
        levelId: id,
        prerequisiteId: invalid,
      });
      continue;
    }

    const questions = selectQuestions(id, kind, prerequisites);
    if (questions.length === 0) {
      issues.push({
        type: 'EmptyQuestionSet',
        message: `Level ${String(id)} has no questions and cannot be scored`,
        levelId: id,
      });
      continue;
    }

    const bank = bankFor(id);
    const topic = bank?.title ?? 'General';
    const difficulty =
      course.difficulties[difficultyIndexFor(id, kind, course.difficulties.length)] ?? 'Beginner';
    const rewards = rewardsFor(id, kind);
    const label = kind === 'lesson' ? 'Lesson' : kind === 'test' ? 'Test' : 'Challenge';

    levels.push({
      id,
      kind,
      title: `${label} ${String(id)}: ${topic}`,
      topicId: bank?.id ?? 'general',
      topic,
      difficulty,
      questions,
      passingScore: settings.passingScore[kind],
      rewards: { stars: MAX_STARS, ...rewards },
      prerequisites,
    });
  }

  const achievements: AchievementDefinition[] = [];
  const achievementIds = new Set<string>();
  for (const definition of content.achievements.achievements) {
    if (achievementIds.has(definition.id)) {
      issues.push({
        type: 'DuplicateAchievementId',
        message: `Achievement '${definition.id}' is defined more than once; later definitions are ignored`,
        achievementId: definition.id,
      });
      continue;
    }
    achievementIds.add(definition.id);
    achievements.push({ ...definition, hidden: definition.hidden ?? false });
  }

  const shopRewards: ShopReward[] = [];
  const rewardIds = new Set<string>();
  for (const reward of content.shop.rewards) {
    if (rewardIds.has(reward.id)) {
      issues.push({
        type: 'DuplicateRewardId',
        message: `Shop reward '${reward.id}' is defined more than once; later definitions are ignored`,
        rewardId: reward.id,
      });
      continue;
    }
    rewardIds.add(reward.id);
    shopRewards.push(reward);
  }

  const catalog: GameCatalog = {
    title: course.title,
    levels,
    levelsById: new Map(levels.map((level) => [level.id, level])),
    achievements,
    tierRewards: content.achievements.tiers,
    shopRewards,
    rules: {
      maxRetries: settings.maxRetries,
      testBonus: settings.testBonus,
    },
    hintsByTopic: new Map(
      banks.filter((bank) => bank.hints.length > 0).map((bank) => [bank.id, bank.hints])
    ),
    defaultHint: course.defaultHint ?? FALLBACK_HINT,
  };

  return { catalog: deepFreeze(catalog), issues };
};
