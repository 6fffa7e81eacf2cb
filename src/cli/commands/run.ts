/**
 * Run CLI command: the bot process.
 *
 * Ensures the data file exists, starts the background sampler, then
 * starts the Telegram bot. Both are stopped on SIGINT/SIGTERM.
 *
 * Usage:
 *   price-watch run
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { PriceWatchConfig } from '../../config/types.js';
import { requireBotToken } from '../../config/reader.js';
import { PriceTracker } from '../../tracker.js';
import { ChatRouter } from '../../chat/router.js';
import { TelegramGateway } from '../../chat/telegram-gateway.js';
import { createLogger } from '../../logging/logger.js';
import { waitForShutdown } from '../shutdown.js';
import { hasHelpFlag } from './args.js';

/**
 * @param args - Command-line arguments after 'run'
 * @returns Exit code
 */
export async function runCommand(args: string[], config: PriceWatchConfig): Promise<number> {
  if (hasHelpFlag(args)) {
    showRunHelp();
    return 0;
  }

  const token = requireBotToken(config);
  const tracker = new PriceTracker(config);
  const gateway = new TelegramGateway(
    token,
    new ChatRouter(tracker),
    createLogger('bot', { level: config.logLevel }),
  );

  p.intro(pc.bgCyan(pc.black(' price-watch ')));
  p.log.info(`Data file: ${pc.dim(config.dataFile)}`);
  p.log.info(`Source: ${pc.dim(config.sourceUrl)}`);

  await tracker.prepareStorage();
  tracker.runSamplerForever();

  try {
    await gateway.start();
    const signal = await waitForShutdown();
    p.log.info(`Received ${signal}, shutting down`);
  } finally {
    await gateway.stop();
    await tracker.stopSampler();
  }

  p.outro('Stopped.');
  return 0;
}

function showRunHelp(): void {
  console.log(`
price-watch run - Start the sampler and the Telegram bot

Usage:
  price-watch run

Environment:
  TELEGRAM_BOT_TOKEN            Bot token (required)
  PRICE_WATCH_DATA_FILE         Data file (default: price_data.json)
  PRICE_WATCH_SOURCE_URL        Page to scrape
  PRICE_WATCH_FETCH_TIMEOUT_MS  Fetch timeout, 1000-60000 (default: 10000)
  PRICE_WATCH_LOG_LEVEL         debug | info | warn | error (default: info)

Bot commands:
  /start, /menu  Quick action buttons
  /price         Current price
  /graph         Chart of the last 6 hours
  /hello         Say hello
  /help          Command list
`);
}
