/**
 * Fixed chat texts, the quick-action menu, and the command list
 * published to the chat platform.
 *
 * @module chat/messages
 */

// ============================================================================
// Types
// ============================================================================

export interface MenuButton {
  text: string;
  /** Callback payload sent back when the button is pressed */
  data: MenuAction;
}

export type MenuAction = 'price' | 'graph' | 'hello';

export interface BotCommandInfo {
  command: string;
  description: string;
}

// ============================================================================
// Texts
// ============================================================================

export const TEXT = {
  menuPrompt: 'Choose an option:',
  hello: 'Hello!',
  priceUnavailable: 'Price not available.',
  noGraphData: 'No graph data available yet.',
  unknownOption: 'Unknown option.',
} as const;

export function currentPriceText(price: number): string {
  return `📈 Current price: ${price}`;
}

/** Shorter form used when a menu button replaces the menu text. */
export function buttonPriceText(price: number): string {
  return `📈 ${price}`;
}

export const HELP_TEXT = [
  'Available commands:',
  '/price - Get current price',
  '/graph - Show price graph',
  '/hello - Say hello',
  '/help - Show help message',
  '/menu - Show quick buttons',
].join('\n');

// ============================================================================
// Menu and command list
// ============================================================================

/** One button per row. */
export const MENU_KEYBOARD: readonly (readonly MenuButton[])[] = [
  [{ text: '📈 Price', data: 'price' }],
  [{ text: '🖼️ Graph', data: 'graph' }],
  [{ text: '👋 Hello', data: 'hello' }],
];

export const BOT_COMMANDS: readonly BotCommandInfo[] = [
  { command: 'start', description: 'Show menu with buttons' },
  { command: 'price', description: 'Get current price' },
  { command: 'graph', description: 'Show 6h price graph' },
  { command: 'hello', description: 'Say hello' },
  { command: 'help', description: 'Show help message' },
  { command: 'menu', description: 'Show quick action buttons' },
];

export function isMenuAction(data: string): data is MenuAction {
  return data === 'price' || data === 'graph' || data === 'hello';
}
