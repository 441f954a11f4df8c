/**
 * Unit tests for catalog derivation
 */

import { describe, expect, it } from 'vitest';

import {
  baseRewardsFor,
  buildCatalog,
  difficultyIndexFor,
  levelKindFor,
  prerequisitesFor,
  rewardsFor,
  topicIndexFor,
} from '@/modules/catalog/core/build-catalog.js';
import { getLevel, getShopReward, toLevelView } from '@/modules/catalog/core/catalog.js';
import { applyRuleOverrides } from '@/modules/catalog/index.js';

import {
  makeAchievementsFile,
  makeCatalogContent,
  makeCourseFile,
  makeShopFile,
  makeTestCatalog,
} from '../../fixtures/builders.js';

const settings = makeCourseFile().progression;

describe('derivation rules', () => {
  it('puts a challenge on every challengeEvery id and a test on every testEvery id', () => {
    const production = { ...settings, testEvery: 10, challengeEvery: 25 };

    expect(levelKindFor(9, production)).toBe('lesson');
    expect(levelKindFor(10, production)).toBe('test');
    expect(levelKindFor(25, production)).toBe('challenge');
    // Both apply: challenge wins
    expect(levelKindFor(50, production)).toBe('challenge');
    expect(levelKindFor(100, production)).toBe('challenge');
  });

  it('computes base rewards from the id', () => {
    expect(baseRewardsFor(1)).toEqual({ coins: 20, xp: 50 });
    expect(baseRewardsFor(10)).toEqual({ coins: 25, xp: 70 });
    expect(baseRewardsFor(47)).toEqual({ coins: 40, xp: 140 });
  });

  it('multiplies base rewards by level kind', () => {
    expect(rewardsFor(10, 'test')).toEqual({ coins: 50, xp: 210 });
    expect(rewardsFor(25, 'challenge')).toEqual({ coins: 90, xp: 400 });
  });

  it('derives prerequisites from the kind', () => {
    expect(prerequisitesFor(1, 'lesson')).toEqual([]);
    expect(prerequisitesFor(7, 'lesson')).toEqual([6]);
    expect(prerequisitesFor(10, 'test')).toEqual([5, 6, 7, 8, 9]);
    expect(prerequisitesFor(3, 'test')).toEqual([1, 2]);
    expect(prerequisitesFor(25, 'challenge')).toEqual([15, 16, 17, 18, 19, 20, 21, 22, 23, 24]);
  });

  it('steps difficulty every 15 ids and makes challenges one tier harder', () => {
    expect(difficultyIndexFor(1, 'lesson', 5)).toBe(0);
    expect(difficultyIndexFor(16, 'lesson', 5)).toBe(1);
    expect(difficultyIndexFor(25, 'challenge', 5)).toBe(2);
    expect(difficultyIndexFor(99, 'lesson', 5)).toBe(4);
    expect(difficultyIndexFor(100, 'challenge', 5)).toBe(4);
  });

  it('cycles topics in runs of three', () => {
    expect(topicIndexFor(1, 30)).toBe(0);
    expect(topicIndexFor(3, 30)).toBe(0);
    expect(topicIndexFor(4, 30)).toBe(1);
    expect(topicIndexFor(91, 30)).toBe(0);
    expect(topicIndexFor(10, 2)).toBe(1);
  });
});

describe('buildCatalog', () => {
  it('builds every fixture level without issues', () => {
    const { catalog, issues } = buildCatalog(makeCatalogContent());

    expect(issues).toEqual([]);
    expect(catalog.levels.map((l) => l.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(catalog.levels.map((l) => l.kind)).toEqual([
      'lesson',
      'lesson',
      'lesson',
      'lesson',
      'test',
      'lesson',
      'lesson',
      'lesson',
      'lesson',
      'challenge',
    ]);
  });

  it('rotates lesson questions by position within the topic', () => {
    const catalog = makeTestCatalog();

    expect(getLevel(catalog, 1)?.questions.map((q) => q.text)).toEqual(['B0', 'B1']);
    expect(getLevel(catalog, 2)?.questions.map((q) => q.text)).toEqual(['B1', 'B2']);
    expect(getLevel(catalog, 3)?.questions.map((q) => q.text)).toEqual(['B2', 'B0']);
    expect(getLevel(catalog, 4)?.questions.map((q) => q.text)).toEqual(['L0', 'L1']);
  });

  it('draws test questions round-robin from the topics of the prerequisite window', () => {
    const level = getLevel(makeTestCatalog(), 5);

    expect(level?.prerequisites).toEqual([1, 2, 3, 4]);
    expect(level?.questions.map((q) => q.text)).toEqual(['B0', 'L0', 'B1']);
    expect(level?.passingScore).toBe(80);
    expect(level?.rewards).toEqual({ stars: 3, coins: 40, xp: 180 });
  });

  it('gives a challenge topic questions plus one code question', () => {
    const level = getLevel(makeTestCatalog(), 10);

    expect(level?.questions.map((q) => q.kind)).toEqual(['multiple_choice', 'code']);
    expect(level?.difficulty).toBe('Easy');
    expect(level?.title).toBe('Challenge 10: Loops');
    expect(level?.rewards).toEqual({ stars: 3, coins: 75, xp: 280 });
  });

  it('skips a level whose prerequisite override points forward', () => {
    const { catalog, issues } = buildCatalog(
      makeCatalogContent({
        course: makeCourseFile({ prerequisiteOverrides: [{ levelId: 3, prerequisites: [4] }] }),
      })
    );

    expect(getLevel(catalog, 3)).toBeNull();
    expect(issues).toEqual([
      {
        type: 'InvalidPrerequisite',
        message: 'Level 3 requires level 4, which does not come before it',
        levelId: 3,
        prerequisiteId: 4,
      },
    ]);
  });

  it('reports and drops a question whose correct index is out of range', () => {
    const course = makeCourseFile();
    const [basics, loops] = course.topics;
    if (basics === undefined || loops === undefined) {
      throw new Error('fixture topics missing');
    }

    const { issues } = buildCatalog(
      makeCatalogContent({
        course: {
          ...course,
          topics: [
            {
              ...basics,
              questions: [
                ...basics.questions,
                { text: 'bad', options: ['a', 'b'], correctIndex: 2, explanation: '' },
              ],
            },
            loops,
          ],
        },
      })
    );

    expect(issues).toEqual([
      {
        type: 'InvalidCorrectIndex',
        message: "Question 3 of topic 'basics' points at option 2 but has 2 options",
        topicId: 'basics',
        questionIndex: 3,
      },
    ]);
  });

  it('skips levels that end up with no questions', () => {
    const course = makeCourseFile();
    const [basics, loops] = course.topics;
    if (basics === undefined || loops === undefined) {
      throw new Error('fixture topics missing');
    }

    const { catalog, issues } = buildCatalog(
      makeCatalogContent({
        course: { ...course, topics: [basics, { ...loops, questions: [] }] },
      })
    );

    // Levels 4, 6 draw only from the empty loops bank
    expect(getLevel(catalog, 4)).toBeNull();
    expect(getLevel(catalog, 6)).toBeNull();
    expect(issues.filter((i) => i.type === 'EmptyQuestionSet').map((i) => i.message)).toEqual([
      'Level 4 has no questions and cannot be scored',
      'Level 6 has no questions and cannot be scored',
    ]);
  });

  it('keeps the first of duplicated achievement and reward ids', () => {
    const achievements = makeAchievementsFile();
    const shop = makeShopFile();
    const [firstAchievement] = achievements.achievements;
    const [firstReward] = shop.rewards;
    if (firstAchievement === undefined || firstReward === undefined) {
      throw new Error('fixture content missing');
    }

    const { catalog, issues } = buildCatalog(
      makeCatalogContent({
        achievements: {
          ...achievements,
          achievements: [...achievements.achievements, { ...firstAchievement, name: 'Copy' }],
        },
        shop: { ...shop, rewards: [...shop.rewards, { ...firstReward, cost: 1 }] },
      })
    );

    expect(issues.map((i) => i.type)).toEqual(['DuplicateAchievementId', 'DuplicateRewardId']);
    expect(catalog.achievements.find((a) => a.id === 'first_steps')?.name).toBe('First Steps');
    expect(getShopReward(catalog, 'hint_pack')?.cost).toBe(100);
  });

  it('returns a deeply frozen catalog', () => {
    const catalog = makeTestCatalog();

    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.levels)).toBe(true);
    expect(Object.isFrozen(getLevel(catalog, 1)?.questions)).toBe(true);
  });
});

describe('lookups', () => {
  it('returns null for unknown ids', () => {
    const catalog = makeTestCatalog();

    expect(getLevel(catalog, 0)).toBeNull();
    expect(getLevel(catalog, 11)).toBeNull();
    expect(getShopReward(catalog, 'nope')).toBeNull();
  });

  it('strips answers from the level view', () => {
    const level = getLevel(makeTestCatalog(), 10);
    if (level === null) {
      throw new Error('level 10 missing');
    }

    expect(toLevelView(level).questions).toEqual([
      { index: 0, kind: 'multiple_choice', text: 'L0', options: ['a', 'b', 'c'] },
      { index: 1, kind: 'code', text: 'Sum an array', starterCode: 'function sum(xs) {}' },
    ]);
  });
});

describe('applyRuleOverrides', () => {
  it('replaces the retry cap when set', () => {
    const catalog = makeTestCatalog();

    expect(applyRuleOverrides(catalog, { maxRetries: 5 }).rules).toEqual({
      maxRetries: 5,
      testBonus: { coins: 200, xp: 100 },
    });
  });

  it('returns the same catalog when nothing is overridden', () => {
    const catalog = makeTestCatalog();

    expect(applyRuleOverrides(catalog, { maxRetries: undefined })).toBe(catalog);
  });
});
