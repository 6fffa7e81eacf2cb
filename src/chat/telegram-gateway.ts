/**
 * Telegram transport for the chat router, built on grammy.
 *
 * Registers every bot command and the menu callback handler, turns
 * router replies into Telegram messages, and publishes the command list.
 * Rendered charts are always released after sending, whether the upload
 * succeeded or not.
 *
 * @module chat/telegram-gateway
 */

import { Bot, InlineKeyboard, InputFile, type BotConfig, type Context } from 'grammy';
import { COMMAND_NAMES, type ChatReply, type ChatRouter } from './router.js';
import { BOT_COMMANDS, type MenuButton } from './messages.js';
import { silentLogger, type Logger } from '../logging/logger.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Build a grammy inline keyboard, one Telegram row per menu row.
 */
export function toInlineKeyboard(rows: readonly (readonly MenuButton[])[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  rows.forEach((row, index) => {
    for (const button of row) {
      keyboard.text(button.text, button.data);
    }
    if (index < rows.length - 1) {
      keyboard.row();
    }
  });
  return keyboard;
}

/**
 * The three ways a reply can reach the chat. Kept separate from grammy's
 * Context so delivery can be exercised without a bot.
 */
export interface ReplyTarget {
  /** True when the update is a button press on a message that can be edited */
  readonly canEdit: boolean;
  sendText(text: string, keyboard?: InlineKeyboard): Promise<unknown>;
  editText(text: string, keyboard?: InlineKeyboard): Promise<unknown>;
  sendPhoto(path: string): Promise<unknown>;
}

export function contextTarget(ctx: Context): ReplyTarget {
  return {
    canEdit: ctx.callbackQuery?.message !== undefined,
    sendText: (text, keyboard) => ctx.reply(text, { reply_markup: keyboard }),
    editText: (text, keyboard) => ctx.editMessageText(text, { reply_markup: keyboard }),
    sendPhoto: (path) => ctx.replyWithPhoto(new InputFile(path)),
  };
}

/**
 * Deliver one router reply. Edit replies fall back to a new message
 * when there is nothing to edit.
 */
export async function sendReply(target: ReplyTarget, reply: ChatReply): Promise<void> {
  if (reply.kind === 'photo') {
    try {
      await target.sendPhoto(reply.series.path);
    } finally {
      await reply.series.release();
    }
    return;
  }

  const keyboard = reply.keyboard ? toInlineKeyboard(reply.keyboard) : undefined;

  if (reply.mode === 'edit' && target.canEdit) {
    await target.editText(reply.text, keyboard);
    return;
  }

  await target.sendText(reply.text, keyboard);
}

// ---------------------------------------------------------------------------
// TelegramGateway
// ---------------------------------------------------------------------------

export class TelegramGateway {
  readonly bot: Bot;
  private readonly logger: Logger;
  private polling: Promise<void> | null = null;

  /**
   * @param botConfig - Passed to grammy's Bot, e.g. `client.apiRoot` for a local Bot API server
   */
  constructor(
    token: string,
    router: ChatRouter,
    logger: Logger = silentLogger,
    botConfig?: BotConfig<Context>,
  ) {
    this.bot = new Bot(token, botConfig);
    this.logger = logger;

    for (const name of COMMAND_NAMES) {
      this.bot.command(name, async (ctx) => {
        await sendReply(contextTarget(ctx), await router.handleCommand(name));
      });
    }

    this.bot.on('callback_query:data', async (ctx) => {
      // Stale queries (pressed while the bot was down) cannot be answered; reply anyway
      await ctx.answerCallbackQuery().catch((err: unknown) => {
        this.logger.debug(`Could not answer callback query: ${String(err)}`);
      });
      await sendReply(contextTarget(ctx), await router.handleButton(ctx.callbackQuery.data));
    });

    this.bot.catch((err) => {
      this.logger.error(`Update ${err.ctx.update.update_id} failed`, err.error);
    });
  }

  /**
   * Publish the command list and begin long polling. Resolves once
   * polling has started; idempotent.
   */
  async start(): Promise<void> {
    if (this.polling !== null) return;

    await this.bot.api.setMyCommands([...BOT_COMMANDS]);

    await new Promise<void>((resolve, reject) => {
      this.polling = this.bot
        .start({
          onStart: (info) => {
            this.logger.info(`Bot @${info.username} is running. Send /start to try it.`);
            resolve();
          },
        })
        .catch((err: unknown) => {
          this.logger.error('Polling stopped with an error', err);
          reject(err);
        });
    });
  }

  /** Stop polling and wait for it to wind down. Idempotent. */
  async stop(): Promise<void> {
    if (this.polling === null) return;

    await this.bot.stop();
    await this.polling.catch((err: unknown) => {
      this.logger.debug(`Polling ended with: ${String(err)}`);
    });
    this.polling = null;
  }
}
