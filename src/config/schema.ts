/**
 * Zod schema for the environment variables price-watch reads.
 *
 * Every field except the bot token has a default, so an empty
 * environment yields a usable config for the one-shot CLI commands.
 * The retention window and poll interval are deliberately absent:
 * they are fixed constants (see types/sample).
 *
 * @module config/schema
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';

/** Page the price is scraped from. */
export const DEFAULT_SOURCE_URL = 'https://polymarket.com/event/us-x-iran-nuclear-deal-in-2025';

/** Data file, relative to the working directory. */
export const DEFAULT_DATA_FILE = 'price_data.json';

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

/**
 * Environment schema. Empty strings count as unset.
 */
export const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1).optional(),
  PRICE_WATCH_DATA_FILE: z.string().trim().min(1).default(DEFAULT_DATA_FILE),
  PRICE_WATCH_SOURCE_URL: z.string().trim().url().default(DEFAULT_SOURCE_URL),
  PRICE_WATCH_FETCH_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1000)
    .max(60_000)
    .default(DEFAULT_FETCH_TIMEOUT_MS),
  PRICE_WATCH_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type RawEnv = z.input<typeof EnvSchema>;
