/**
 * Sampler loop -- the periodic fetch, append and prune task.
 *
 * Each tick asks the price source for a value and, when one comes back,
 * appends it to the sample store. Failures of any kind are logged and
 * reported as a tick outcome; they never end the loop. After every tick
 * the loop waits a fixed interval before the next one, so the period
 * drifts by the tick's own duration.
 *
 * start()/stop() follow the same idempotent lifecycle as the other
 * long-running services: start() returns immediately, stop() aborts the
 * pending wait and resolves once the loop has exited.
 *
 * @module sampler/sampler-loop
 */

import { setTimeout as sleepFor } from 'node:timers/promises';
import type { PriceSource } from '../source/page-source.js';
import type { SampleStore } from '../storage/sample-store.js';
import { POLL_INTERVAL_SECONDS, nowSeconds, type Sample } from '../types/sample.js';
import { describeError, silentLogger, type Logger } from '../logging/logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TickOutcome =
  | { status: 'stored'; sample: Sample; retained: number }
  | { status: 'skipped'; at: number }
  | { status: 'failed'; at: number; error: string };

/** Waits `ms`, rejecting with an AbortError when `signal` fires. */
export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SamplerLoopOptions {
  source: PriceSource;
  store: Pick<SampleStore, 'appendAndPrune'>;
  /** Seconds between ticks (default: POLL_INTERVAL_SECONDS) */
  intervalSeconds?: number;
  /** Epoch-seconds clock (default: wall clock) */
  clock?: () => number;
  sleep?: SleepFn;
  logger?: Logger;
}

export interface SamplerStatus {
  running: boolean;
  ticks: number;
  lastOutcome: TickOutcome | null;
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

// ---------------------------------------------------------------------------
// SamplerLoop
// ---------------------------------------------------------------------------

export class SamplerLoop {
  private readonly source: PriceSource;
  private readonly store: Pick<SampleStore, 'appendAndPrune'>;
  private readonly intervalMs: number;
  private readonly clock: () => number;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;

  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private ticks = 0;
  private lastOutcome: TickOutcome | null = null;

  constructor(options: SamplerLoopOptions) {
    this.source = options.source;
    this.store = options.store;
    this.intervalMs = (options.intervalSeconds ?? POLL_INTERVAL_SECONDS) * 1000;
    this.clock = options.clock ?? nowSeconds;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? silentLogger;
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  /**
   * Run one fetch-append-prune cycle. Never rejects.
   */
  async tick(): Promise<TickOutcome> {
    let outcome: TickOutcome;

    try {
      const value = await this.source.fetchPrice();
      const at = this.clock();

      if (value === null) {
        // The source has already logged the reason
        this.logger.debug('No price this tick, nothing stored');
        outcome = { status: 'skipped', at };
      } else {
        const retained = await this.store.appendAndPrune(value, at);
        this.logger.info(`Saved price ${value} at ${new Date(at * 1000).toISOString()}`);
        outcome = { status: 'stored', sample: { timestamp: at, value }, retained: retained.length };
      }
    } catch (err: unknown) {
      this.logger.error('Sampler tick failed', err);
      outcome = { status: 'failed', at: this.clock(), error: describeError(err) };
    }

    this.ticks += 1;
    this.lastOutcome = outcome;
    return outcome;
  }

  /**
   * Start ticking in the background: once now, then every interval.
   * Idempotent.
   */
  start(): void {
    if (this.loop !== null) return;

    const abort = new AbortController();
    this.abort = abort;
    this.loop = this.run(abort.signal);
  }

  /**
   * Stop the loop. Waits for an in-flight tick to finish. Idempotent.
   */
  async stop(): Promise<void> {
    if (this.abort === null || this.loop === null) return;

    this.abort.abort();
    await this.loop;

    this.abort = null;
    this.loop = null;
  }

  status(): SamplerStatus {
    return {
      running: this.loop !== null,
      ticks: this.ticks,
      lastOutcome: this.lastOutcome,
    };
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.tick();
      if (signal.aborted) break;

      try {
        await this.sleep(this.intervalMs, signal);
      } catch (err: unknown) {
        if (signal.aborted) break;
        // A broken timer must not end the loop either
        this.logger.error('Sampler wait failed', err);
      }
    }
    this.logger.debug('Sampler loop stopped');
  }
}
