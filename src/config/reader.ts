/**
 * Config reader with Zod validation.
 *
 * Builds the single PriceWatchConfig object from the process environment.
 * It is read once at startup and passed to every component constructor;
 * nothing downstream reads process.env.
 *
 * @module config/reader
 */

import { EnvSchema } from './schema.js';
import type { PriceWatchConfig } from './types.js';
import { POLL_INTERVAL_SECONDS, RETENTION_SECONDS } from '../types/sample.js';

// ============================================================================
// Error type
// ============================================================================

/**
 * Error thrown when the environment fails validation, or when a
 * command needs a setting that was not provided.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

type EnvLike = Record<string, string | undefined>;

/** Drop empty and whitespace-only values so defaults apply. */
function withoutBlankValues(env: EnvLike): EnvLike {
  const cleaned: EnvLike = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Validate raw environment values (no throw).
 */
export function validateConfig(
  env: EnvLike,
): { valid: true; config: PriceWatchConfig } | { valid: false; errors: string[] } {
  const result = EnvSchema.safeParse(withoutBlankValues(env));

  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return { valid: false, errors };
  }

  const data = result.data;
  const config: PriceWatchConfig = Object.freeze({
    botToken: data.TELEGRAM_BOT_TOKEN,
    dataFile: data.PRICE_WATCH_DATA_FILE,
    sourceUrl: data.PRICE_WATCH_SOURCE_URL,
    fetchTimeoutMs: data.PRICE_WATCH_FETCH_TIMEOUT_MS,
    logLevel: data.PRICE_WATCH_LOG_LEVEL,
    retentionSeconds: RETENTION_SECONDS,
    pollIntervalSeconds: POLL_INTERVAL_SECONDS,
  });

  return { valid: true, config };
}

/**
 * Read and validate the config from the environment.
 *
 * @throws {ConfigError} When any variable fails validation
 */
export function readConfig(env: EnvLike = process.env): PriceWatchConfig {
  const result = validateConfig(env);
  if (!result.valid) {
    const field = result.errors[0]?.split(':')[0];
    throw new ConfigError(`Config validation failed:\n${result.errors.join('\n')}`, field);
  }
  return result.config;
}

/**
 * Return the bot token or fail with a message naming the variable.
 */
export function requireBotToken(config: PriceWatchConfig): string {
  if (!config.botToken) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN is not set', 'TELEGRAM_BOT_TOKEN');
  }
  return config.botToken;
}
