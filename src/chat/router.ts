/**
 * Transport-agnostic chat router.
 *
 * Maps slash commands and menu button presses to replies. The router
 * only decides what to say; the transport adapter decides how to send
 * it. A photo reply hands a rendered chart to the adapter, which then
 * owns the file and must release it.
 *
 * Both the /graph command and the Graph button send the chart as a new
 * message; the menu message is left in place.
 *
 * @module chat/router
 */

import type { RenderedSeries } from '../render/series-renderer.js';
import {
  BOT_COMMANDS,
  HELP_TEXT,
  MENU_KEYBOARD,
  TEXT,
  buttonPriceText,
  currentPriceText,
  isMenuAction,
  type MenuButton,
} from './messages.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ChatReply =
  | {
      kind: 'text';
      text: string;
      keyboard?: readonly (readonly MenuButton[])[];
      /** 'edit' replaces the message the button belongs to */
      mode: 'reply' | 'edit';
    }
  | { kind: 'photo'; series: RenderedSeries };

/** The two tracker operations the router needs. */
export interface ReadingProvider {
  getCurrentReading(): Promise<number | null>;
  renderSeries(): Promise<RenderedSeries | null>;
}

export const COMMAND_NAMES: readonly string[] = BOT_COMMANDS.map(c => c.command);

// ---------------------------------------------------------------------------
// ChatRouter
// ---------------------------------------------------------------------------

export class ChatRouter {
  constructor(private readonly tracker: ReadingProvider) {}

  /**
   * Reply to a slash command (name without the leading slash).
   * Unknown commands get the help text.
   */
  async handleCommand(name: string): Promise<ChatReply> {
    switch (name.toLowerCase()) {
      case 'start':
      case 'menu':
        return { kind: 'text', text: TEXT.menuPrompt, keyboard: MENU_KEYBOARD, mode: 'reply' };

      case 'price': {
        const price = await this.tracker.getCurrentReading();
        return text(price === null ? TEXT.priceUnavailable : currentPriceText(price), 'reply');
      }

      case 'graph':
        return this.graphReply('reply');

      case 'hello':
        return text(TEXT.hello, 'reply');

      case 'help':
      default:
        return text(HELP_TEXT, 'reply');
    }
  }

  /**
   * Reply to a menu button press, identified by its callback data.
   */
  async handleButton(data: string): Promise<ChatReply> {
    if (!isMenuAction(data)) {
      return text(TEXT.unknownOption, 'edit');
    }

    switch (data) {
      case 'price': {
        const price = await this.tracker.getCurrentReading();
        return text(price === null ? TEXT.priceUnavailable : buttonPriceText(price), 'edit');
      }

      case 'graph':
        return this.graphReply('edit');

      case 'hello':
        return text(TEXT.hello, 'edit');
    }
  }

  private async graphReply(noDataMode: 'reply' | 'edit'): Promise<ChatReply> {
    const series = await this.tracker.renderSeries();
    if (series === null) {
      return text(TEXT.noGraphData, noDataMode);
    }
    return { kind: 'photo', series };
  }
}

function text(value: string, mode: 'reply' | 'edit'): ChatReply {
  return { kind: 'text', text: value, mode };
}
