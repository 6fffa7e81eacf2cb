/**
 * Sample CLI command.
 *
 * Runs the sampler without the chat bot: either a single tick in the
 * foreground (--once) or the periodic loop until SIGINT/SIGTERM.
 *
 * Usage:
 *   price-watch sample [--once] [--json]
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { PriceTracker } from '../../tracker.js';
import type { TickOutcome } from '../../sampler/sampler-loop.js';
import { waitForShutdown } from '../shutdown.js';
import { hasHelpFlag } from './args.js';

type SampleTracker = Pick<
  PriceTracker,
  'sampleOnce' | 'prepareStorage' | 'runSamplerForever' | 'stopSampler' | 'samplerStatus'
>;

/**
 * Describe a tick outcome for the terminal.
 */
export function describeOutcome(outcome: TickOutcome): string {
  switch (outcome.status) {
    case 'stored':
      return `Stored ${outcome.sample.value} (${outcome.retained} samples retained)`;
    case 'skipped':
      return 'Price not available, nothing stored';
    case 'failed':
      return `Tick failed: ${outcome.error}`;
  }
}

/**
 * @param args - Command-line arguments after 'sample'
 * @param shutdown - Resolves when the loop should stop (default: first SIGINT/SIGTERM)
 * @returns Exit code (with --once: 0 only when a sample was stored)
 */
export async function sampleCommand(
  args: string[],
  tracker: SampleTracker,
  shutdown: () => Promise<unknown> = waitForShutdown,
): Promise<number> {
  if (hasHelpFlag(args)) {
    showSampleHelp();
    return 0;
  }

  await tracker.prepareStorage();

  if (args.includes('--once')) {
    const outcome = await tracker.sampleOnce();
    if (args.includes('--json')) {
      console.log(JSON.stringify(outcome));
    } else if (outcome.status === 'stored') {
      p.log.success(describeOutcome(outcome));
    } else {
      p.log.warn(describeOutcome(outcome));
    }
    return outcome.status === 'stored' ? 0 : 1;
  }

  p.intro(pc.bgCyan(pc.black(' Price Sampler ')));
  tracker.runSamplerForever();
  p.log.info('Sampling every 10 minutes. Press Ctrl+C to stop.');

  await shutdown();
  await tracker.stopSampler();

  const { ticks } = tracker.samplerStatus();
  p.outro(`Stopped after ${ticks} tick${ticks === 1 ? '' : 's'}.`);
  return 0;
}

function showSampleHelp(): void {
  console.log(`
price-watch sample - Record prices without starting the bot

Usage:
  price-watch sample [--once] [--json]

Options:
  --once      Run a single fetch-and-store cycle and exit
  --json      With --once, print the tick outcome as JSON
  --help, -h  Show this help message
`);
}
