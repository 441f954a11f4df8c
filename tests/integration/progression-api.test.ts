/**
 * Integration tests for levels, attempts, dashboard, achievements and shop
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { makeInMemoryPlayerRepo, type Player } from '@/modules/players/index.js';

import { makeTestAppDeps, makeTestPlayer } from '../fixtures/builders.js';
import { makeWriteFailingPlayerRepo } from '../fixtures/fakes.js';

import type { FastifyInstance } from 'fastify';

describe('Progression API', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    if (app != null) {
      await app.close();
    }
  });

  const appWith = async (players: Player[] = [makeTestPlayer()]) =>
    createApp({
      fastifyOptions: { logger: false },
      deps: makeTestAppDeps({
        playerRepo: makeInMemoryPlayerRepo({ initialPlayers: players }),
      }),
    });

  describe('levels', () => {
    it('returns the level map', async () => {
      app = await appWith();

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/players/player-1/levels',
      });

      expect(response.statusCode).toBe(200);
      const entries: { id: number; state: string }[] = response.json().data;
      expect(entries).toHaveLength(10);
      expect(entries.slice(0, 2).map((e) => [e.id, e.state])).toEqual([
        [1, 'available'],
        [2, 'locked'],
      ]);
    });

    it('returns an unlocked level without answers', async () => {
      app = await appWith();

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/players/player-1/levels/1',
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data.level.questions).toEqual([
        { index: 0, kind: 'multiple_choice', text: 'B0', options: ['a', 'b', 'c'] },
        { index: 1, kind: 'multiple_choice', text: 'B1', options: ['a', 'b', 'c'] },
      ]);
    });

    it('returns 403 for a locked level', async () => {
      app = await appWith();

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/players/player-1/levels/3',
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({
        ok: false,
        error: 'LevelNotAvailableError',
        message: 'Level 3 is locked; complete level(s) 2 first',
      });
    });

    it('returns 404 for an unknown level', async () => {
      app = await appWith();

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/players/player-1/levels/99',
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().error).toBe('LevelNotFoundError');
    });

    it('returns 400 for a level id that is not a number', async () => {
      app = await appWith();

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/players/player-1/levels/first',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('ValidationError');
    });
  });

  describe('GET /api/v1/players/:playerId/levels/:levelId/hint', () => {
    it('returns the next hint for the level topic', async () => {
      app = await appWith([makeTestPlayer({ levelAttempts: { '1': 1 } })]);

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/players/player-1/levels/1/hint',
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        ok: true,
        data: { levelId: 1, topic: 'Basics', hint: 'Rule out the wrong options first' },
      });
    });

    it('returns 403 for a locked level', async () => {
      app = await appWith();

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/players/player-1/levels/3/hint',
      });

      expect(response.statusCode).toBe(403);
      expect(response.json().error).toBe('LevelNotAvailableError');
    });
  });

  describe('POST /api/v1/players/:playerId/levels/:levelId/attempts', () => {
    const url = '/api/v1/players/player-1/levels/1/attempts';

    it('grades and records the attempt', async () => {
      app = await appWith();

      const response = await app.inject({
        method: 'POST',
        url,
        payload: { answers: [0, 1], timeTakenSeconds: 90 },
      });

      expect(response.statusCode).toBe(200);
      const data = response.json().data;
      expect(data).toMatchObject({
        success: true,
        levelId: 1,
        passed: true,
        scorePercentage: 100,
        starsEarned: 3,
        coinsEarned: 60,
        xpEarned: 150,
        nextLevelUnlocked: 2,
        attemptsRemaining: 2,
        newBestScore: true,
        playerLevel: 1,
        leveledUp: false,
        totals: { totalXp: 225, totalCoins: 210, learningStreak: 1 },
      });
      expect(data.questions[0]).toEqual({
        index: 0,
        kind: 'multiple_choice',
        correct: true,
        explanation: 'B0 explained',
      });
      expect(data.newAchievements.map((a: { achievementId: string }) => a.achievementId)).toEqual(
        ['first_steps', 'perfectionist']
      );

      const map = await app.inject({ method: 'GET', url: '/api/v1/players/player-1/levels' });
      expect(map.json().data[1].state).toBe('available');
    });

    it('returns 400 when the answer count does not match', async () => {
      app = await appWith();

      const response = await app.inject({ method: 'POST', url, payload: { answers: [0] } });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'AnswerCountMismatchError',
        message: 'Expected 2 answers but received 1',
      });
    });

    it('returns 400 for an answer of the wrong type', async () => {
      app = await appWith();

      const response = await app.inject({
        method: 'POST',
        url,
        payload: { answers: [0, { option: 1 }] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('ValidationError');
    });

    it('rejects a boolean answer instead of reading it as an option index', async () => {
      app = await appWith();

      const response = await app.inject({
        method: 'POST',
        url,
        payload: { answers: [0, true] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ ok: false, error: 'ValidationError' });
      const stored = await app.inject({ method: 'GET', url: '/api/v1/players/player-1/levels/1' });
      expect(stored.json().data.progress.attempts).toBe(0);
    });

    it('returns 409 once the attempts are used up', async () => {
      app = await appWith([makeTestPlayer({ levelAttempts: { '1': 3 } })]);

      const response = await app.inject({ method: 'POST', url, payload: { answers: [0, 1] } });

      expect(response.statusCode).toBe(409);
      expect(response.json()).toEqual({
        ok: false,
        error: 'RetryLimitExceededError',
        message: 'Level 1 allows 3 attempts and 3 have been used',
      });
    });

    it('reports the score of an attempt that could not be saved', async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: makeTestAppDeps({ playerRepo: makeWriteFailingPlayerRepo([makeTestPlayer()]) }),
      });

      const response = await app.inject({ method: 'POST', url, payload: { answers: [0, 2] } });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ProgressNotSavedError',
        message:
          'Level 1 was graded (50%, not passed) but progress could not be saved; the result may not be durable',
        scorePercentage: 50,
        passed: false,
      });
    });
  });

  describe('GET /api/v1/players/:playerId/dashboard', () => {
    it('summarises a new player', async () => {
      app = await appWith();

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/players/player-1/dashboard',
      });

      expect(response.statusCode).toBe(200);
      const data = response.json().data;
      expect(data.player).toMatchObject({ id: 'player-1', username: 'ada', playerLevel: 1 });
      expect(data.nextLevel).toMatchObject({ id: 1, state: 'available' });
      expect(data.recommendations.map((r: { levelId: number }) => r.levelId)).toEqual([1]);
      expect(data.recentAttempts).toEqual([]);
      expect(data.topicPerformance).toEqual([]);
    });
  });

  describe('GET /api/v1/players/:playerId/achievements', () => {
    it('lists visible achievements with progress', async () => {
      app = await appWith([makeTestPlayer({ learningStreak: 2 })]);

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/players/player-1/achievements',
      });

      expect(response.statusCode).toBe(200);
      expect(
        response.json().data.map((a: { id: string; percentage: number }) => [a.id, a.percentage])
      ).toEqual([
        ['first_steps', 0],
        ['perfectionist', 0],
        ['streak_master', 28],
      ]);
    });

    it('returns 404 for an unknown player', async () => {
      app = await appWith([]);

      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/players/player-1/achievements',
      });

      expect(response.statusCode).toBe(404);
    });
  });

  describe('shop', () => {
    it('lists rewards with ownership and affordability', async () => {
      app = await appWith([makeTestPlayer({ totalCoins: 150 })]);

      const response = await app.inject({ method: 'GET', url: '/api/v1/players/player-1/shop' });

      expect(response.statusCode).toBe(200);
      const data = response.json().data;
      expect(data.coins).toBe(150);
      expect(
        data.rewards.map((r: { id: string; affordable: boolean }) => [r.id, r.affordable])
      ).toEqual([
        ['hint_pack', true],
        ['theme_dark', false],
      ]);
    });

    it('buys a reward once', async () => {
      app = await appWith([makeTestPlayer({ totalCoins: 150 })]);
      const purchase = () =>
        app.inject({
          method: 'POST',
          url: '/api/v1/players/player-1/purchases',
          payload: { rewardId: 'hint_pack' },
        });

      const first = await purchase();
      const second = await purchase();

      expect(first.statusCode).toBe(200);
      expect(first.json()).toEqual({
        ok: true,
        data: { success: true, rewardId: 'hint_pack', remainingCoins: 50 },
      });
      expect(second.statusCode).toBe(409);
      expect(second.json()).toEqual({
        ok: false,
        error: 'RewardAlreadyOwnedError',
        message: "Shop reward 'hint_pack' is already owned",
        reason: 'AlreadyOwned',
      });
    });

    it('returns 404 for an unknown reward', async () => {
      app = await appWith([makeTestPlayer({ totalCoins: 150 })]);

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/players/player-1/purchases',
        payload: { rewardId: 'nope' },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ error: 'RewardNotFoundError', reason: 'NotFound' });
    });
  });
});
