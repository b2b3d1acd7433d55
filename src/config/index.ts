/**
 * Central configuration. All env vars are read here so the rest of the app
 * stays env-agnostic and testable. `loadConfig` validates eagerly and returns
 * a frozen value that callers pass down explicitly.
 */
import dotenv from 'dotenv';

dotenv.config();

export type Env = Record<string, string | undefined>;

const REQUIRED_KEYS = ['OPENAI_API_KEY'] as const;

/** winston's npm levels. */
export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly missing: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface AiConfig {
  openaiApiKey: string;
  /** Model used when a caller does not name one. */
  defaultModel: string;
  maxMessageLength: number;
  /** Total attempts per dispatch, not extra retries. */
  maxRetries: number;
  apiTimeoutSeconds: number;
}

export interface AppConfig {
  env: string;
  port: number;
  apiPrefix: string;
  logLevel: string;
  ai: AiConfig;
}

export function getMissingConfig(env: Env = process.env): string[] {
  return REQUIRED_KEYS.filter((key) => !env[key]?.trim());
}

export function validateConfig(env: Env = process.env): boolean {
  return getMissingConfig(env).length === 0;
}

function positiveNumber(env: Env, key: string, fallback: number, integer: boolean): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigurationError(
      `Invalid configuration: ${key} must be a positive ${integer ? 'integer' : 'number'}, got "${raw}"`
    );
  }
  return value;
}

function logLevel(env: Env): string {
  const raw = env.LOG_LEVEL?.trim() || 'info';
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  if (!level) {
    throw new ConfigurationError(`Invalid configuration: LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const missing = getMissingConfig(env);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required configuration: ${missing.join(', ')}`, missing);
  }

  const ai: AiConfig = Object.freeze({
    openaiApiKey: env.OPENAI_API_KEY?.trim() ?? '',
    defaultModel: env.DEFAULT_MODEL?.trim() || 'gpt-3.5-turbo',
    maxMessageLength: positiveNumber(env, 'MAX_MESSAGE_LENGTH', 4000, true),
    maxRetries: positiveNumber(env, 'MAX_RETRIES', 3, true),
    apiTimeoutSeconds: positiveNumber(env, 'API_TIMEOUT', 30, false),
  });

  return Object.freeze({
    env: env.NODE_ENV || 'development',
    port: positiveNumber(env, 'PORT', 4000, true),
    apiPrefix: env.API_PREFIX || '/api/v1',
    logLevel: logLevel(env),
    ai,
  });
}
