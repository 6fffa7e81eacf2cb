/**
 * Series Renderer: turns the retained samples into a PNG chart file.
 *
 * Each render reads the store, builds the SVG chart and rasterizes it
 * with sharp into a uniquely named file under the temp directory.
 * The file belongs to the caller from the moment render() returns;
 * release() deletes it. withRenderedSeries() wraps that in try/finally.
 *
 * @module render/series-renderer
 */

import { writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import sharp from 'sharp';
import { buildSeriesSvg, type SeriesChartOptions } from './series-svg.js';
import type { SampleStore } from '../storage/sample-store.js';
import { silentLogger, type Logger } from '../logging/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A rendered chart on disk. Caller-owned: call release() exactly once
 * when done, on success and failure paths alike.
 */
export interface RenderedSeries {
  readonly path: string;
  readonly sampleCount: number;
  release(): Promise<void>;
}

export type Rasterizer = (svg: string) => Promise<Buffer>;

export interface SeriesRendererOptions {
  store: Pick<SampleStore, 'load'>;
  /** Directory for chart files (default: os.tmpdir()) */
  outputDir?: string;
  chart?: SeriesChartOptions;
  rasterize?: Rasterizer;
  logger?: Logger;
}

export const rasterizeWithSharp: Rasterizer = (svg) => sharp(Buffer.from(svg, 'utf-8')).png().toBuffer();

// ============================================================================
// SeriesRenderer
// ============================================================================

export class SeriesRenderer {
  private readonly store: Pick<SampleStore, 'load'>;
  private readonly outputDir: string;
  private readonly chart: SeriesChartOptions;
  private readonly rasterize: Rasterizer;
  private readonly logger: Logger;

  constructor(options: SeriesRendererOptions) {
    this.store = options.store;
    this.outputDir = options.outputDir ?? tmpdir();
    this.chart = options.chart ?? {};
    this.rasterize = options.rasterize ?? rasterizeWithSharp;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Render the current series.
   *
   * @returns The chart file, or null when there is no data or rendering failed
   */
  async render(): Promise<RenderedSeries | null> {
    const samples = await this.store.load();
    if (samples.length === 0) {
      return null;
    }

    const path = join(
      this.outputDir,
      `price-series-${Date.now()}-${Math.random().toString(36).slice(2)}.png`,
    );

    try {
      const svg = buildSeriesSvg(samples, this.chart);
      const png = await this.rasterize(svg);
      await writeFile(path, png);
    } catch (err: unknown) {
      this.logger.error('Failed to render price chart', err);
      await rm(path, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug(`Could not remove ${path}: ${String(cleanupError)}`);
      });
      return null;
    }

    let released = false;
    return {
      path,
      sampleCount: samples.length,
      release: async () => {
        if (released) return;
        released = true;
        await rm(path, { force: true });
      },
    };
  }
}

/**
 * Render, hand the chart to `fn`, and always release the file afterwards.
 *
 * @returns fn's result, or null when there was nothing to render
 */
export async function withRenderedSeries<T>(
  renderer: Pick<SeriesRenderer, 'render'>,
  fn: (series: RenderedSeries) => Promise<T>,
): Promise<T | null> {
  const series = await renderer.render();
  if (series === null) return null;

  try {
    return await fn(series);
  } finally {
    await series.release();
  }
}
