/**
 * Configuration module
 */

export { EnvSchema, parseEnv, createConfig, type Env, type AppConfig } from './env.js';
