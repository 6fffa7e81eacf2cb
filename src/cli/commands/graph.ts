/**
 * Graph CLI command.
 *
 * Renders the retained series and copies the chart to a file. The
 * rendered temp file is always released afterwards.
 *
 * Usage:
 *   price-watch graph [--out=<path>]
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { copyFile } from 'node:fs/promises';
import type { PriceTracker } from '../../tracker.js';
import { withRenderedSeries } from '../../render/series-renderer.js';
import { extractFlag, hasHelpFlag } from './args.js';

export const DEFAULT_GRAPH_OUT = 'price_plot.png';

/**
 * @param args - Command-line arguments after 'graph'
 * @returns Exit code (0 on success, 1 when there is nothing to render)
 */
export async function graphCommand(
  args: string[],
  tracker: Pick<PriceTracker, 'renderSeries'>,
): Promise<number> {
  if (hasHelpFlag(args)) {
    showGraphHelp();
    return 0;
  }

  const out = extractFlag(args, 'out') ?? DEFAULT_GRAPH_OUT;

  const written = await withRenderedSeries({ render: () => tracker.renderSeries() }, async (series) => {
    await copyFile(series.path, out);
    return series.sampleCount;
  });

  if (written === null) {
    p.log.warn('No graph data available yet.');
    return 1;
  }

  p.log.success(`Wrote ${pc.bold(out)} (${written} samples)`);
  return 0;
}

function showGraphHelp(): void {
  console.log(`
price-watch graph - Render the price chart to a PNG file

Usage:
  price-watch graph [--out=<path>]

Options:
  --out=<path>  Output file (default: ${DEFAULT_GRAPH_OUT})
  --help, -h    Show this help message
`);
}
