import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { makeInMemoryPlayerRepo } from '@/modules/players/index.js';

import {
  makeHealthChecker,
  makeTestAppDeps,
  makeTestConfig,
  makeTestPlayer,
} from '../fixtures/builders.js';

import type { FastifyInstance } from 'fastify';

describe('GraphQL API', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    if (app != null) {
      await app.close();
    }
  });

  const query = (source: string) =>
    app.inject({ method: 'POST', url: '/graphql', payload: { query: source } });

  it('can query health', async () => {
    app = await createApp({ fastifyOptions: { logger: false }, deps: makeTestAppDeps() });

    const response = await query('query { health }');

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.errors).toBeUndefined();
    expect(body.data).toEqual({ health: 'ok' });
  });

  it('can query ready status', async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: makeTestAppDeps({ healthCheckers: [makeHealthChecker('database')] }),
    });

    const response = await query('query { ready { status checks { name status } } }');

    expect(response.json().data.ready).toEqual({
      status: 'ok',
      checks: [
        { name: 'catalog', status: 'healthy' },
        { name: 'database', status: 'healthy' },
      ],
    });
  });

  it('lists levels without answers', async () => {
    app = await createApp({ fastifyOptions: { logger: false }, deps: makeTestAppDeps() });

    const response = await query(`
      query {
        levels { id kind }
        level(id: 5) { title passingScore prerequisites questions { text options } }
      }
    `);

    const { levels, level } = response.json().data;
    expect(levels).toHaveLength(10);
    expect(levels[4]).toEqual({ id: 5, kind: 'test' });
    expect(level).toEqual({
      title: 'Test 5: Loops',
      passingScore: 80,
      prerequisites: [1, 2, 3, 4],
      questions: [
        { text: 'B0', options: ['a', 'b', 'c'] },
        { text: 'L0', options: ['a', 'b', 'c'] },
        { text: 'B1', options: ['a', 'b', 'c'] },
      ],
    });
  });

  it('returns null for an unknown level', async () => {
    app = await createApp({ fastifyOptions: { logger: false }, deps: makeTestAppDeps() });

    const response = await query('query { level(id: 42) { id } }');

    expect(response.json().data).toEqual({ level: null });
  });

  it('hides hidden achievement definitions', async () => {
    app = await createApp({ fastifyOptions: { logger: false }, deps: makeTestAppDeps() });

    const response = await query('query { achievements { id tier } shopRewards { id cost } }');

    expect(response.json().data).toEqual({
      achievements: [
        { id: 'first_steps', tier: 'bronze' },
        { id: 'perfectionist', tier: 'silver' },
        { id: 'streak_master', tier: 'gold' },
      ],
      shopRewards: [
        { id: 'hint_pack', cost: 100 },
        { id: 'theme_dark', cost: 200 },
      ],
    });
  });

  it('ranks the leaderboard', async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: makeTestAppDeps({
        playerRepo: makeInMemoryPlayerRepo({
          initialPlayers: [
            makeTestPlayer({ id: 'a', username: 'alpha', totalXp: 100 }),
            makeTestPlayer({ id: 'b', username: 'bravo', totalXp: 300 }),
          ],
        }),
      }),
    });

    const response = await query('query { leaderboard(limit: 5) { rank username totalXp } }');

    expect(response.json().data.leaderboard).toEqual([
      { rank: 1, username: 'bravo', totalXp: 300 },
      { rank: 2, username: 'alpha', totalXp: 100 },
    ]);
  });

  it('returns the level map of a player', async () => {
    app = await createApp({ fastifyOptions: { logger: false }, deps: makeTestAppDeps() });

    const response = await query(
      'query { levelMap(playerId: "player-1") { id state rewards { coins } } }'
    );

    expect(response.json().data.levelMap.slice(0, 2)).toEqual([
      { id: 1, state: 'available', rewards: { coins: 20 } },
      { id: 2, state: 'locked', rewards: { coins: 20 } },
    ]);
  });

  it('reports an unknown player as an error', async () => {
    app = await createApp({ fastifyOptions: { logger: false }, deps: makeTestAppDeps() });

    const response = await query('query { levelMap(playerId: "ghost") { id } }');

    expect(response.json().errors[0].message).toBe(
      "[PlayerNotFoundError] Player 'ghost' not found"
    );
  });

  it('disables introspection in production', async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: makeTestAppDeps({
        config: makeTestConfig({
          server: {
            port: 3000,
            host: '0.0.0.0',
            isDevelopment: false,
            isProduction: true,
            isTest: false,
          },
        }),
      }),
    });

    const response = await query('query { __schema { queryType { name } } }');

    expect(response.json().errors).toHaveLength(1);
  });
});
