/**
 * SVG line chart of the price series.
 *
 * Pure renderer: typed samples in, SVG string out. No IO.
 * The chart has a grid, one marker per sample, fixed title and axis
 * labels, and rotated time labels thinned to a fixed maximum so they
 * never overlap.
 *
 * @module render/series-svg
 */

import { format } from 'date-fns';
import type { Sample } from '../types/sample.js';

// ============================================================================
// Types
// ============================================================================

export interface SeriesChartOptions {
  width?: number;
  height?: number;
  title?: string;
  xLabel?: string;
  yLabel?: string;
  /** Max number of time labels on the x axis */
  maxTimeLabels?: number;
  /** Formats an epoch-seconds timestamp for the x axis */
  formatTime?: (timestamp: number) => string;
}

// ============================================================================
// Constants
// ============================================================================

export const CHART_TITLE = 'Polymarket Price - Last 6 Hours';
export const CHART_X_LABEL = 'Time';
export const CHART_Y_LABEL = 'Price × 100';

const Y_TICKS = 5;
const LABEL_ROTATION = -30;
const MARGIN = { top: 40, right: 24, bottom: 84, left: 72 };
const LINE_COLOR = '#1f77b4';
const GRID_COLOR = '#d0d0d0';

// ============================================================================
// Helpers
// ============================================================================

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Local wall-clock time, e.g. "14:05". */
export function formatLocalTime(timestamp: number): string {
  return format(new Date(timestamp * 1000), 'HH:mm');
}

/**
 * Pick at most `max` indices spread evenly over `count` points,
 * always including the first and the last.
 */
export function pickLabelIndices(count: number, max: number): number[] {
  if (count <= 0) return [];
  if (count <= max) return Array.from({ length: count }, (_, i) => i);
  if (max <= 1) return [count - 1];

  const indices = new Set<number>();
  const step = (count - 1) / (max - 1);
  for (let i = 0; i < max; i++) {
    indices.add(Math.round(i * step));
  }
  return [...indices].sort((a, b) => a - b);
}

/** Value range padded by 5%; a flat series gets ±1 around its value. */
function valueRange(values: number[]): { min: number; max: number } {
  const lo = Math.min(...values);
  const hi = Math.max(...values);
  if (lo === hi) return { min: lo - 1, max: hi + 1 };
  const pad = (hi - lo) * 0.05;
  return { min: lo - pad, max: hi + pad };
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

// ============================================================================
// Renderer
// ============================================================================

/**
 * Render the series as a standalone SVG document.
 *
 * @param samples - Series in chronological order; must not be empty
 */
export function buildSeriesSvg(samples: readonly Sample[], options: SeriesChartOptions = {}): string {
  if (samples.length === 0) {
    throw new RangeError('buildSeriesSvg needs at least one sample');
  }

  const width = options.width ?? 800;
  const height = options.height ?? 400;
  const title = options.title ?? CHART_TITLE;
  const xLabel = options.xLabel ?? CHART_X_LABEL;
  const yLabel = options.yLabel ?? CHART_Y_LABEL;
  const maxTimeLabels = options.maxTimeLabels ?? 8;
  const formatTime = options.formatTime ?? formatLocalTime;

  const plotLeft = MARGIN.left;
  const plotRight = width - MARGIN.right;
  const plotTop = MARGIN.top;
  const plotBottom = height - MARGIN.bottom;
  const plotWidth = plotRight - plotLeft;
  const plotHeight = plotBottom - plotTop;

  const firstTs = samples[0].timestamp;
  const lastTs = samples[samples.length - 1].timestamp;
  const span = lastTs - firstTs;
  const { min, max } = valueRange(samples.map(s => s.value));

  const xOf = (ts: number): number =>
    round2(span === 0 ? plotLeft + plotWidth / 2 : plotLeft + ((ts - firstTs) / span) * plotWidth);
  const yOf = (value: number): number => round2(plotBottom - ((value - min) / (max - min)) * plotHeight);

  const parts: string[] = [];

  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="DejaVu Sans, Arial, sans-serif">`,
  );
  parts.push(`  <rect width="${width}" height="${height}" fill="#ffffff"/>`);

  // Horizontal grid + y tick labels
  for (let i = 0; i < Y_TICKS; i++) {
    const value = min + ((max - min) * i) / (Y_TICKS - 1);
    const y = yOf(value);
    parts.push(`  <line class="grid" x1="${plotLeft}" y1="${y}" x2="${plotRight}" y2="${y}" stroke="${GRID_COLOR}" stroke-width="1"/>`);
    parts.push(
      `  <text class="y-tick" x="${plotLeft - 8}" y="${y + 4}" font-size="11" text-anchor="end">${round2(value)}</text>`,
    );
  }

  // Vertical grid + rotated time labels
  for (const index of pickLabelIndices(samples.length, maxTimeLabels)) {
    const sample = samples[index];
    const x = xOf(sample.timestamp);
    const labelY = plotBottom + 16;
    parts.push(`  <line class="grid" x1="${x}" y1="${plotTop}" x2="${x}" y2="${plotBottom}" stroke="${GRID_COLOR}" stroke-width="1"/>`);
    parts.push(
      `  <text class="x-tick" x="${x}" y="${labelY}" font-size="11" text-anchor="end" transform="rotate(${LABEL_ROTATION} ${x} ${labelY})">${escapeXml(formatTime(sample.timestamp))}</text>`,
    );
  }

  // Axes
  parts.push(`  <line x1="${plotLeft}" y1="${plotBottom}" x2="${plotRight}" y2="${plotBottom}" stroke="#000000" stroke-width="1"/>`);
  parts.push(`  <line x1="${plotLeft}" y1="${plotTop}" x2="${plotLeft}" y2="${plotBottom}" stroke="#000000" stroke-width="1"/>`);

  // Series
  const points = samples.map(s => `${xOf(s.timestamp)},${yOf(s.value)}`).join(' ');
  parts.push(`  <polyline class="series" points="${points}" fill="none" stroke="${LINE_COLOR}" stroke-width="2"/>`);
  for (const s of samples) {
    parts.push(`  <circle class="marker" cx="${xOf(s.timestamp)}" cy="${yOf(s.value)}" r="3.5" fill="${LINE_COLOR}"/>`);
  }

  // Title and axis labels
  parts.push(
    `  <text class="title" x="${width / 2}" y="${plotTop - 14}" font-size="16" text-anchor="middle">${escapeXml(title)}</text>`,
  );
  parts.push(
    `  <text class="x-label" x="${plotLeft + plotWidth / 2}" y="${height - 10}" font-size="13" text-anchor="middle">${escapeXml(xLabel)}</text>`,
  );
  const yLabelX = 18;
  const yLabelY = plotTop + plotHeight / 2;
  parts.push(
    `  <text class="y-label" x="${yLabelX}" y="${yLabelY}" font-size="13" text-anchor="middle" transform="rotate(-90 ${yLabelX} ${yLabelY})">${escapeXml(yLabel)}</text>`,
  );

  parts.push('</svg>');
  return parts.join('\n');
}
