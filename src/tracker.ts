/**
 * PriceTracker -- the surface the chat gateway and the CLI talk to.
 *
 * Wires source, store, sampler and renderer from one config object and
 * exposes the three gateway operations: read the current price, render
 * the retained series, and start the background sampler.
 *
 * @module tracker
 */

import type { PriceWatchConfig } from './config/types.js';
import { PageSource, type FetchFn, type PriceSource } from './source/page-source.js';
import { SampleStore } from './storage/sample-store.js';
import { SamplerLoop, type SamplerStatus, type SleepFn, type TickOutcome } from './sampler/sampler-loop.js';
import { SeriesRenderer, type Rasterizer, type RenderedSeries } from './render/series-renderer.js';
import { createLogger, type Logger } from './logging/logger.js';
import type { Sample } from './types/sample.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Overrides for tests and embedding; everything defaults from config. */
export interface PriceTrackerOverrides {
  source?: PriceSource;
  fetch?: FetchFn;
  rasterize?: Rasterizer;
  renderDir?: string;
  clock?: () => number;
  sleep?: SleepFn;
  /** Builds the logger for each component scope */
  loggerFor?: (scope: string) => Logger;
}

// ---------------------------------------------------------------------------
// PriceTracker
// ---------------------------------------------------------------------------

export class PriceTracker {
  readonly store: SampleStore;
  private readonly source: PriceSource;
  private readonly sampler: SamplerLoop;
  private readonly renderer: SeriesRenderer;
  private readonly logger: Logger;

  constructor(config: PriceWatchConfig, overrides: PriceTrackerOverrides = {}) {
    const loggerFor = overrides.loggerFor ?? ((scope: string) => createLogger(scope, { level: config.logLevel }));

    this.logger = loggerFor('tracker');
    this.source =
      overrides.source ??
      new PageSource({
        url: config.sourceUrl,
        timeoutMs: config.fetchTimeoutMs,
        fetch: overrides.fetch,
        logger: loggerFor('source'),
      });
    this.store = new SampleStore(config.dataFile, {
      retentionSeconds: config.retentionSeconds,
      logger: loggerFor('store'),
    });
    this.sampler = new SamplerLoop({
      source: this.source,
      store: this.store,
      intervalSeconds: config.pollIntervalSeconds,
      clock: overrides.clock,
      sleep: overrides.sleep,
      logger: loggerFor('sampler'),
    });
    this.renderer = new SeriesRenderer({
      store: this.store,
      outputDir: overrides.renderDir,
      rasterize: overrides.rasterize,
      logger: loggerFor('render'),
    });
  }

  /**
   * Fetch the price right now, bypassing the store.
   *
   * @returns The price, or null when it cannot be read
   */
  async getCurrentReading(): Promise<number | null> {
    try {
      return await this.source.fetchPrice();
    } catch (err: unknown) {
      this.logger.error('Price lookup failed', err);
      return null;
    }
  }

  /**
   * Render the retained series. The caller owns the returned file and
   * must release() it.
   */
  renderSeries(): Promise<RenderedSeries | null> {
    return this.renderer.render();
  }

  /**
   * Start the background sampler. Call once at startup; further calls
   * are no-ops.
   */
  runSamplerForever(): void {
    this.sampler.start();
  }

  stopSampler(): Promise<void> {
    return this.sampler.stop();
  }

  /** Run a single sampler tick in the foreground. */
  sampleOnce(): Promise<TickOutcome> {
    return this.sampler.tick();
  }

  samplerStatus(): SamplerStatus {
    return this.sampler.status();
  }

  /** Retained samples, oldest first. */
  listSamples(): Promise<Sample[]> {
    return this.store.load();
  }

  /** Create the data file as an empty series if it is missing. */
  async prepareStorage(): Promise<void> {
    if (await this.store.ensureInitialized()) {
      this.logger.info(`Created empty data file ${this.store.filePath}`);
    }
  }
}
