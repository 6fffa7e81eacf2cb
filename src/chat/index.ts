/**
 * Chat gateway barrel exports.
 *
 * @module chat
 */

export { ChatRouter, COMMAND_NAMES } from './router.js';
export type { ChatReply, ReadingProvider } from './router.js';

export { TelegramGateway, contextTarget, sendReply, toInlineKeyboard } from './telegram-gateway.js';
export type { ReplyTarget } from './telegram-gateway.js';

export {
  BOT_COMMANDS,
  HELP_TEXT,
  MENU_KEYBOARD,
  TEXT,
  currentPriceText,
  buttonPriceText,
  isMenuAction,
} from './messages.js';
export type { MenuButton, MenuAction, BotCommandInfo } from './messages.js';
