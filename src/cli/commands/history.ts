/**
 * History CLI command.
 *
 * Lists the samples currently retained in the data file, oldest first.
 *
 * Usage:
 *   price-watch history [--json]
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { format } from 'date-fns';
import type { PriceTracker } from '../../tracker.js';
import { toRecord } from '../../types/sample.js';
import { hasHelpFlag } from './args.js';

/**
 * @param args - Command-line arguments after 'history'
 * @returns Exit code (always 0; an empty store is not an error)
 */
export async function historyCommand(
  args: string[],
  tracker: Pick<PriceTracker, 'listSamples'>,
): Promise<number> {
  if (hasHelpFlag(args)) {
    showHistoryHelp();
    return 0;
  }

  const samples = await tracker.listSamples();

  if (args.includes('--json')) {
    console.log(JSON.stringify(samples.map(toRecord), null, 2));
    return 0;
  }

  p.intro(pc.bgCyan(pc.black(' Price History ')));

  if (samples.length === 0) {
    p.log.info('No samples recorded yet.');
    p.outro('Done.');
    return 0;
  }

  for (const sample of samples) {
    const when = format(new Date(sample.timestamp * 1000), 'yyyy-MM-dd HH:mm:ss');
    p.log.message(`${pc.dim(when)}  ${sample.value}`);
  }

  const values = samples.map(s => s.value);
  p.log.message('');
  p.log.message(
    `${samples.length} samples, min ${Math.min(...values)}, max ${Math.max(...values)}, latest ${values[values.length - 1]}`,
  );
  p.outro('Done.');
  return 0;
}

function showHistoryHelp(): void {
  console.log(`
price-watch history - List retained samples (last 6 hours)

Usage:
  price-watch history [--json]

Options:
  --json      Print the raw [{"time", "price"}] records
  --help, -h  Show this help message
`);
}
