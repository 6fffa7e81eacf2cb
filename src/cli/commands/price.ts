/**
 * Price CLI command.
 *
 * Fetches the page once and prints the current price. Does not touch
 * the data file.
 *
 * Usage:
 *   price-watch price [--json]
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { PriceTracker } from '../../tracker.js';
import { hasHelpFlag } from './args.js';

/**
 * @param args - Command-line arguments after 'price'
 * @returns Exit code (0 when a price was read, 1 otherwise)
 */
export async function priceCommand(
  args: string[],
  tracker: Pick<PriceTracker, 'getCurrentReading'>,
): Promise<number> {
  if (hasHelpFlag(args)) {
    showPriceHelp();
    return 0;
  }

  const json = args.includes('--json');
  const price = await tracker.getCurrentReading();

  if (json) {
    console.log(JSON.stringify({ price }));
    return price === null ? 1 : 0;
  }

  if (price === null) {
    p.log.error('Price not available.');
    return 1;
  }

  p.log.success(`Current price: ${pc.bold(String(price))}`);
  return 0;
}

function showPriceHelp(): void {
  console.log(`
price-watch price - Fetch the current price

Usage:
  price-watch price [--json]

Options:
  --json      Print {"price": <number|null>}
  --help, -h  Show this help message
`);
}
