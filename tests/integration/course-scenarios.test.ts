/**
 * End-to-end rules over the shipped course content
 */

import { fileURLToPath } from 'node:url';

import pinoLogger from 'pino';
import { beforeAll, describe, expect, it } from 'vitest';

import { awardAchievements, checkNewAchievements } from '@/modules/achievements/index.js';
import { getLevel, loadCatalog, type GameCatalog } from '@/modules/catalog/index.js';
import { makeInMemoryPlayerRepo, type Player } from '@/modules/players/index.js';
import { submitAttempt } from '@/modules/progression/index.js';
import { makeVmSyntaxChecker } from '@/modules/scoring/index.js';

import { makePlayerWithCompleted, makeTestPlayer, T0 } from '../fixtures/builders.js';

const CONTENT_DIR = fileURLToPath(new URL('../../content', import.meta.url));

describe('course scenarios', () => {
  let catalog: GameCatalog;

  beforeAll(async () => {
    const loaded = await loadCatalog({
      rootDir: CONTENT_DIR,
      logger: pinoLogger({ level: 'silent' }),
    });
    catalog = loaded._unsafeUnwrap();
  });

  const submit = (player: Player, levelId: number, answers: (number | string)[]) => {
    const repo = makeInMemoryPlayerRepo({ initialPlayers: [player] });
    const result = submitAttempt(
      { repo, catalog, syntaxChecker: makeVmSyntaxChecker() },
      { playerId: player.id, levelId, answers, timeTakenSeconds: null, now: T0 }
    );
    return { repo, result };
  };

  it('passes the first lesson with a perfect score', async () => {
    const { repo, result } = submit(makeTestPlayer(), 1, [2, 1]);

    expect((await result)._unsafeUnwrap().output).toMatchObject({
      scorePercentage: 100,
      starsEarned: 3,
      passed: true,
    });
    const stored = (await repo.findById('player-1'))._unsafeUnwrap();
    expect(stored?.completedLevels).toEqual([1]);
  });

  it('fails a test level at three of five', async () => {
    const level = getLevel(catalog, 10);
    expect(level).toMatchObject({ kind: 'test', passingScore: 80 });
    const answers = (level?.questions ?? []).map((question, index) => {
      if (question.kind !== 'multiple_choice') {
        throw new Error('Test levels hold multiple-choice questions only');
      }
      return index < 3
        ? question.correctIndex
        : (question.correctIndex + 1) % question.options.length;
    });
    expect(answers).toHaveLength(5);

    const { repo, result } = submit(makePlayerWithCompleted(9), 10, answers);

    expect((await result)._unsafeUnwrap().output).toMatchObject({
      scorePercentage: 60,
      passed: false,
      starsEarned: 0,
      coinsEarned: 0,
      xpEarned: 0,
      attemptNumber: 1,
    });
    const stored = (await repo.findById('player-1'))._unsafeUnwrap();
    expect(stored?.levelAttempts['10']).toBe(1);
    expect(stored?.completedLevels).not.toContain(10);
  });

  it('awards the streak achievement once', () => {
    const player = makePlayerWithCompleted(9, { learningStreak: 7, longestStreak: 7 });

    const first = checkNewAchievements(player, catalog.achievements, catalog.tierRewards, T0);
    const streak = first.earned.find((a) => a.achievementId === 'streak_master');
    expect(streak).toMatchObject({ tier: 'gold', coins: 200, xp: 100 });

    const awarded = awardAchievements(player, first.earned);
    const second = checkNewAchievements(awarded, catalog.achievements, catalog.tierRewards, T0);

    expect(second.earned.map((a) => a.achievementId)).not.toContain('streak_master');
    expect(awardAchievements(awarded, first.earned)).toBe(awarded);
  });
});
