/**
 * Source Reader: fetches the market page and extracts the current price.
 *
 * Performs a single HTTP GET with a bounded timeout. Every failure mode
 * (non-2xx status, transport error, timeout, missing pattern, bad number)
 * becomes a failed reading; nothing is thrown and nothing is retried.
 * The next sampler tick or the next chat request is the retry.
 *
 * @module source/page-source
 */

import { extractOutcomePrice, type PriceExtractor } from './extract.js';
import { describeError, silentLogger, type Logger } from '../logging/logger.js';

// ============================================================================
// Types
// ============================================================================

export type ReadingFailure = 'http-status' | 'network' | 'timeout' | 'pattern-missing' | 'invalid-number';

export type SourceReading =
  | { ok: true; value: number }
  | { ok: false; reason: ReadingFailure; detail: string };

/**
 * Anything that can produce the current price.
 */
export interface PriceSource {
  /** Current price, or null when it could not be read this time. */
  fetchPrice(): Promise<number | null>;
}

/** Injected for tests; defaults to the global fetch. */
export type FetchFn = (url: string, init: { signal: AbortSignal; headers: Record<string, string> }) => Promise<Response>;

export interface PageSourceOptions {
  url: string;
  timeoutMs: number;
  extractor?: PriceExtractor;
  fetch?: FetchFn;
  logger?: Logger;
}

// Some hosts reject requests without a browser-like agent
const REQUEST_HEADERS: Record<string, string> = {
  'user-agent': 'Mozilla/5.0 (compatible; price-watch/1.0)',
  accept: 'text/html,application/json;q=0.9,*/*;q=0.8',
};

// ============================================================================
// PageSource
// ============================================================================

export class PageSource implements PriceSource {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly extractor: PriceExtractor;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: PageSourceOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.extractor = options.extractor ?? extractOutcomePrice;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? silentLogger;
  }

  async fetchPrice(): Promise<number | null> {
    const reading = await this.fetchReading();
    if (!reading.ok) {
      this.logger.warn(`Price unavailable (${reading.reason}): ${reading.detail}`);
      return null;
    }
    return reading.value;
  }

  /**
   * Fetch the page and report either the value or why there is none.
   */
  async fetchReading(): Promise<SourceReading> {
    let body: string;

    try {
      const response = await this.fetchFn(this.url, {
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: REQUEST_HEADERS,
      });

      if (!response.ok) {
        return { ok: false, reason: 'http-status', detail: `HTTP ${response.status} from ${this.url}` };
      }

      body = await response.text();
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));

      // AbortSignal.timeout() rejects with TimeoutError (AbortError on older runtimes)
      if (error.name === 'TimeoutError' || error.name === 'AbortError') {
        return { ok: false, reason: 'timeout', detail: `request timed out after ${this.timeoutMs}ms` };
      }

      return { ok: false, reason: 'network', detail: describeError(error) };
    }

    return this.extractor(body);
  }
}
