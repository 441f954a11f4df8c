/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env).toEqual({
        NODE_ENV: 'development',
        PORT: 3000,
        HOST: '0.0.0.0',
        LOG_LEVEL: 'info',
        DATABASE_URL: undefined,
        CONTENT_DIR: './content',
        MAX_RETRIES: undefined,
        ADMIN_API_KEY: undefined,
        ALLOWED_ORIGINS: undefined,
        CLIENT_BASE_URL: undefined,
      });
    });

    it('parses numbers', () => {
      const env = parseEnv({ PORT: '8080', MAX_RETRIES: '5' });

      expect(env.PORT).toBe(8080);
      expect(env.MAX_RETRIES).toBe(5);
    });

    it('treats empty strings as unset', () => {
      const env = parseEnv({ DATABASE_URL: '', ADMIN_API_KEY: '', CONTENT_DIR: '', PORT: '' });

      expect(env.DATABASE_URL).toBeUndefined();
      expect(env.ADMIN_API_KEY).toBeUndefined();
      expect(env.CONTENT_DIR).toBe('./content');
      expect(env.PORT).toBe(3000);
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        expect(parseEnv({ LOG_LEVEL: level }).LOG_LEVEL).toBe(level);
      }
    });

    it('rejects an unknown NODE_ENV', () => {
      expect(() => parseEnv({ NODE_ENV: 'staging' })).toThrow(
        /^Invalid environment configuration: \/NODE_ENV/
      );
    });

    it('rejects a PORT that is not a number', () => {
      expect(() => parseEnv({ PORT: 'http' })).toThrow(
        /^Invalid environment configuration: \/PORT/
      );
    });

    it('rejects a retry cap outside 1..10', () => {
      expect(() => parseEnv({ MAX_RETRIES: '0' })).toThrow(/\/MAX_RETRIES/);
      expect(() => parseEnv({ MAX_RETRIES: '11' })).toThrow(/\/MAX_RETRIES/);
      expect(() => parseEnv({ MAX_RETRIES: '2.5' })).toThrow(/\/MAX_RETRIES/);
    });
  });

  describe('createConfig', () => {
    it('derives environment flags and pretty logging', () => {
      const dev = createConfig(parseEnv({}));
      const prod = createConfig(parseEnv({ NODE_ENV: 'production' }));

      expect(dev.server).toEqual({
        port: 3000,
        host: '0.0.0.0',
        isDevelopment: true,
        isProduction: false,
        isTest: false,
      });
      expect(dev.logger).toEqual({ level: 'info', pretty: true });
      expect(prod.server.isProduction).toBe(true);
      expect(prod.logger.pretty).toBe(false);
    });

    it('groups game and CORS settings', () => {
      const config = createConfig(
        parseEnv({
          CONTENT_DIR: '/srv/content',
          MAX_RETRIES: '4',
          ADMIN_API_KEY: 'test-secret',
          ALLOWED_ORIGINS: 'https://a.example',
          CLIENT_BASE_URL: 'https://app.example',
          DATABASE_URL: 'postgres://localhost/game',
        })
      );

      expect(config.game).toEqual({
        contentDir: '/srv/content',
        maxRetries: 4,
        adminApiKey: 'test-secret',
      });
      expect(config.cors).toEqual({
        allowedOrigins: 'https://a.example',
        clientBaseUrl: 'https://app.example',
      });
      expect(config.database.url).toBe('postgres://localhost/game');
    });
  });
});
