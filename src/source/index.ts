/**
 * Source reader barrel exports.
 *
 * @module source
 */

export { PageSource } from './page-source.js';
export type { PriceSource, SourceReading, ReadingFailure, FetchFn, PageSourceOptions } from './page-source.js';

export {
  extractOutcomePrice,
  parseDecimal,
  toPercent,
  OUTCOME_PRICES_PATTERN,
} from './extract.js';
export type { ExtractResult, PriceExtractor } from './extract.js';
