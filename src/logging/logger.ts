/**
 * Scoped stderr logger.
 *
 * Core components take a Logger in their constructor so the long-running
 * process can report fetch failures and storage problems without the CLI
 * layer being involved. Lines are written as `[scope] message` to stderr,
 * coloured with picocolors.
 *
 * @module logging/logger
 */

import pc from 'picocolors';

// ============================================================================
// Types
// ============================================================================

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/** Sink for formatted lines. Defaults to process.stderr. */
export type LogWriter = (line: string) => void;

export interface LoggerOptions {
  /** Minimum level to emit (default: 'info') */
  level?: LogLevel;
  writer?: LogWriter;
}

// ============================================================================
// Helpers
// ============================================================================

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: pc.dim,
  info: pc.cyan,
  warn: pc.yellow,
  error: pc.red,
};

/**
 * Render an unknown thrown value as a single message.
 * Node's fetch wraps the underlying failure in `cause`; that message is preferred.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message}: ${cause.message}`;
    }
    return error.message;
  }
  return String(error);
}

const defaultWriter: LogWriter = (line) => {
  process.stderr.write(line + '\n');
};

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a logger that prefixes every line with `[scope]`.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const minRank = LEVEL_RANK[options.level ?? 'info'];
  const write = options.writer ?? defaultWriter;

  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_RANK[level] < minRank) return;
    write(`${pc.dim(`[${scope}]`)} ${LEVEL_COLOR[level](message)}`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message, error) => {
      emit('error', error === undefined ? message : `${message}: ${describeError(error)}`);
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
