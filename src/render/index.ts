/**
 * Chart rendering barrel exports.
 *
 * @module render
 */

export { SeriesRenderer, withRenderedSeries, rasterizeWithSharp } from './series-renderer.js';
export type { RenderedSeries, Rasterizer, SeriesRendererOptions } from './series-renderer.js';

export {
  buildSeriesSvg,
  formatLocalTime,
  pickLabelIndices,
  escapeXml,
  CHART_TITLE,
  CHART_X_LABEL,
  CHART_Y_LABEL,
} from './series-svg.js';
export type { SeriesChartOptions } from './series-svg.js';
