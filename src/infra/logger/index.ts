/**
 * Logger factory using Pino
 *
 * The same options drive the standalone logger and Fastify's request logger,
 * so startup, repository and request lines share one format.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'code-quest-server',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/** Never written to logs. */
const REDACTED_PATHS = ['req.headers["x-admin-key"]', 'req.headers.authorization'];

/**
 * Builds Pino options; pass the result to `pino()` or to Fastify's `logger`.
 */
export const createLoggerOptions = (config: Partial<LoggerConfig> = {}): LoggerOptions => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };

  // Readable output for local runs
  if (finalConfig.pretty === true) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return options;
};

export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  return pinoLib(createLoggerOptions(config));
};

export { type Logger } from 'pino';
