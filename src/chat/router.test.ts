import { describe, it, expect, vi } from 'vitest';
import { ChatRouter, COMMAND_NAMES, type ReadingProvider } from './router.js';
import { HELP_TEXT, MENU_KEYBOARD } from './messages.js';
import type { RenderedSeries } from '../render/series-renderer.js';

function makeSeries(): RenderedSeries {
  return { path: '/tmp/price-series-test.png', sampleCount: 3, release: vi.fn(async () => {}) };
}

function makeProvider(price: number | null, series: RenderedSeries | null): ReadingProvider {
  return {
    getCurrentReading: vi.fn(async () => price),
    renderSeries: vi.fn(async () => series),
  };
}

describe('ChatRouter.handleCommand', () => {
  it('answers /start and /menu with the menu keyboard', async () => {
    const router = new ChatRouter(makeProvider(37, null));

    for (const name of ['start', 'menu']) {
      expect(await router.handleCommand(name)).toEqual({
        kind: 'text',
        text: 'Choose an option:',
        keyboard: MENU_KEYBOARD,
        mode: 'reply',
      });
    }
  });

  it('answers /price with the current price', async () => {
    const router = new ChatRouter(makeProvider(37.5, null));
    expect(await router.handleCommand('price')).toEqual({
      kind: 'text',
      text: '📈 Current price: 37.5',
      mode: 'reply',
    });
  });

  it('answers /price with a fallback when the price is unavailable', async () => {
    const router = new ChatRouter(makeProvider(null, null));
    expect(await router.handleCommand('price')).toEqual({
      kind: 'text',
      text: 'Price not available.',
      mode: 'reply',
    });
  });

  it('answers /graph with the rendered chart', async () => {
    const series = makeSeries();
    const router = new ChatRouter(makeProvider(null, series));

    const reply = await router.handleCommand('graph');

    expect(reply).toEqual({ kind: 'photo', series });
  });

  it('answers /graph with a notice when there is no data', async () => {
    const router = new ChatRouter(makeProvider(null, null));
    expect(await router.handleCommand('graph')).toEqual({
      kind: 'text',
      text: 'No graph data available yet.',
      mode: 'reply',
    });
  });

  it('answers /hello', async () => {
    const router = new ChatRouter(makeProvider(null, null));
    expect(await router.handleCommand('hello')).toEqual({ kind: 'text', text: 'Hello!', mode: 'reply' });
  });

  it('answers /help and unknown commands with the help text', async () => {
    const router = new ChatRouter(makeProvider(null, null));
    expect(await router.handleCommand('help')).toEqual({ kind: 'text', text: HELP_TEXT, mode: 'reply' });
    expect(await router.handleCommand('weather')).toEqual({ kind: 'text', text: HELP_TEXT, mode: 'reply' });
  });

  it('does not fetch the price for commands that do not need it', async () => {
    const provider = makeProvider(37, null);
    const router = new ChatRouter(provider);

    await router.handleCommand('hello');
    await router.handleCommand('start');

    expect(provider.getCurrentReading).not.toHaveBeenCalled();
    expect(provider.renderSeries).not.toHaveBeenCalled();
  });
});

describe('ChatRouter.handleButton', () => {
  it('replaces the menu with the short price text', async () => {
    const router = new ChatRouter(makeProvider(42, null));
    expect(await router.handleButton('price')).toEqual({ kind: 'text', text: '📈 42', mode: 'edit' });
  });

  it('replaces the menu with the fallback when the price is unavailable', async () => {
    const router = new ChatRouter(makeProvider(null, null));
    expect(await router.handleButton('price')).toEqual({
      kind: 'text',
      text: 'Price not available.',
      mode: 'edit',
    });
  });

  it('sends the chart as a photo', async () => {
    const series = makeSeries();
    const router = new ChatRouter(makeProvider(null, series));
    expect(await router.handleButton('graph')).toEqual({ kind: 'photo', series });
  });

  it('replaces the menu with the no-data notice', async () => {
    const router = new ChatRouter(makeProvider(null, null));
    expect(await router.handleButton('graph')).toEqual({
      kind: 'text',
      text: 'No graph data available yet.',
      mode: 'edit',
    });
  });

  it('replaces the menu with a greeting', async () => {
    const router = new ChatRouter(makeProvider(null, null));
    expect(await router.handleButton('hello')).toEqual({ kind: 'text', text: 'Hello!', mode: 'edit' });
  });

  it('rejects unknown callback data', async () => {
    const router = new ChatRouter(makeProvider(null, null));
    expect(await router.handleButton('sell')).toEqual({ kind: 'text', text: 'Unknown option.', mode: 'edit' });
  });
});

describe('COMMAND_NAMES', () => {
  it('lists every published command', () => {
    expect(COMMAND_NAMES).toEqual(['start', 'price', 'graph', 'hello', 'help', 'menu']);
  });
});
