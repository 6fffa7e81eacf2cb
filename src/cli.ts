#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { z } from 'zod';
import { readConfig } from './config/reader.js';
import { PriceTracker } from './tracker.js';
import { runCommand } from './cli/commands/run.js';
import { sampleCommand } from './cli/commands/sample.js';
import { priceCommand } from './cli/commands/price.js';
import { graphCommand } from './cli/commands/graph.js';
import { historyCommand } from './cli/commands/history.js';

const PackageInfoSchema = z.object({ name: z.string(), version: z.string() });

async function printVersion(): Promise<void> {
  const require = createRequire(import.meta.url);
  const pkg = PackageInfoSchema.parse(require('../package.json'));

  console.log(`${pkg.name}  v${pkg.version}`);
  console.log(`Node.js      ${process.version}`);
  console.log(`Platform     ${process.platform} ${process.arch}`);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0] ?? 'run';
  const subArgs = args.slice(1);

  if (command === '--version' || command === '-V') {
    await printVersion();
    return;
  }

  if (command === 'help' || command === '--help' || command === '-h') {
    showHelp();
    return;
  }

  const config = readConfig();
  let exitCode: number;

  switch (command) {
    case 'run':
    case 'r': {
      exitCode = await runCommand(subArgs, config);
      break;
    }

    case 'sample':
    case 's': {
      exitCode = await sampleCommand(subArgs, new PriceTracker(config));
      break;
    }

    case 'price':
    case 'p': {
      exitCode = await priceCommand(subArgs, new PriceTracker(config));
      break;
    }

    case 'graph':
    case 'g': {
      exitCode = await graphCommand(subArgs, new PriceTracker(config));
      break;
    }

    case 'history':
    case 'hist': {
      exitCode = await historyCommand(subArgs, new PriceTracker(config));
      break;
    }

    default: {
      p.log.error(`Unknown command: ${pc.bold(command)}`);
      showHelp();
      exitCode = 1;
    }
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

function showHelp(): void {
  console.log(`
price-watch - Track a market price and serve it over Telegram

Usage:
  price-watch [command] [options]

Commands:
  run, r          Start the sampler and the Telegram bot (default)
  sample, s       Record prices without the bot (--once for a single tick)
  price, p        Fetch and print the current price
  graph, g        Render the last 6 hours to a PNG (--out=<path>)
  history, hist   List retained samples (--json)
  help            Show this message
  --version, -V   Show version information

Run "price-watch <command> --help" for command options.

Examples:
  TELEGRAM_BOT_TOKEN=... price-watch run
  price-watch sample --once
  price-watch graph --out=chart.png
  price-watch history --json

Storage:
  Samples are kept in price_data.json (PRICE_WATCH_DATA_FILE) as a JSON
  array of {"time", "price"} records covering the last 6 hours.
`);
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
