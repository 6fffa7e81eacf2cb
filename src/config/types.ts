import type { LogLevel } from '../logging/logger.js';

/**
 * Validated runtime configuration, built once at startup.
 */
export interface PriceWatchConfig {
  /** Telegram bot token; only the `run` command requires it */
  readonly botToken: string | undefined;
  /** Path of the JSON data file */
  readonly dataFile: string;
  /** Page scraped for the price */
  readonly sourceUrl: string;
  /** Upper bound for one page fetch */
  readonly fetchTimeoutMs: number;
  readonly logLevel: LogLevel;
  /** Fixed: 21600 */
  readonly retentionSeconds: number;
  /** Fixed: 600 */
  readonly pollIntervalSeconds: number;
}
