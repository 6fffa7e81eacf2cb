/**
 * Config module barrel exports.
 *
 * @module config
 */

export type { PriceWatchConfig } from './types.js';

export {
  EnvSchema,
  DEFAULT_SOURCE_URL,
  DEFAULT_DATA_FILE,
  DEFAULT_FETCH_TIMEOUT_MS,
} from './schema.js';
export type { RawEnv } from './schema.js';

export { readConfig, validateConfig, requireBotToken, ConfigError } from './reader.js';
