/**
 * JSON-file sample store with time-based retention.
 *
 * The whole series lives in one file holding a JSON array of
 * `{ "time": <epoch seconds>, "price": <number> }` records, rewritten in
 * full on every update. Writes go to a temp file in the same directory
 * and are renamed over the target, so a concurrent reader always parses
 * either the previous or the next complete snapshot.
 *
 * Missing, unreadable or corrupt files read as an empty series.
 *
 * @module storage/sample-store
 */

import { readFile, writeFile, rename, rm, mkdir } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import {
  RETENTION_SECONDS,
  SampleFileSchema,
  fromRecord,
  toRecord,
  type Sample,
} from '../types/sample.js';
import { silentLogger, type Logger } from '../logging/logger.js';

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised when the data file cannot be written. The previous file, if any,
 * is left untouched.
 */
export class SampleStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SampleStoreError';
  }
}

// ============================================================================
// DI Interface
// ============================================================================

/** Filesystem operations used by the store. */
export interface SampleStoreDeps {
  readFile: (path: string) => Promise<string>;
  writeFile: (path: string, data: string) => Promise<void>;
  rename: (from: string, to: string) => Promise<void>;
  rm: (path: string) => Promise<void>;
  mkdir: (path: string) => Promise<unknown>;
}

const defaultDeps: SampleStoreDeps = {
  readFile: (path) => readFile(path, 'utf-8'),
  writeFile: (path, data) => writeFile(path, data, 'utf-8'),
  rename: (from, to) => rename(from, to),
  rm: (path) => rm(path, { force: true }),
  mkdir: (path) => mkdir(path, { recursive: true }),
};

export interface SampleStoreOptions {
  /** Trailing window in seconds (default: RETENTION_SECONDS) */
  retentionSeconds?: number;
  logger?: Logger;
  deps?: SampleStoreDeps;
}

// ============================================================================
// Retention
// ============================================================================

/**
 * Keep samples whose timestamp is at or after `now - retentionSeconds`.
 * Order is preserved.
 */
export function pruneSamples(
  samples: readonly Sample[],
  now: number,
  retentionSeconds: number = RETENTION_SECONDS,
): Sample[] {
  const cutoff = now - retentionSeconds;
  return samples.filter(s => s.timestamp >= cutoff);
}

// ============================================================================
// SampleStore
// ============================================================================

export class SampleStore {
  readonly filePath: string;
  private readonly retentionSeconds: number;
  private readonly logger: Logger;
  private readonly deps: SampleStoreDeps;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string, options: SampleStoreOptions = {}) {
    this.filePath = filePath;
    this.retentionSeconds = options.retentionSeconds ?? RETENTION_SECONDS;
    this.logger = options.logger ?? silentLogger;
    this.deps = options.deps ?? defaultDeps;
  }

  /**
   * Read the stored series. Never throws.
   *
   * @returns Samples in stored order, or [] if the file is missing or invalid
   */
  async load(): Promise<Sample[]> {
    let content: string;
    try {
      content = await this.deps.readFile(this.filePath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.logger.debug(`No data file at ${this.filePath}, starting empty`);
      } else {
        this.logger.warn(`Cannot read ${this.filePath}, treating as empty: ${String(error)}`);
      }
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      this.logger.warn(`Invalid JSON in ${this.filePath}, treating as empty`);
      return [];
    }

    const result = SampleFileSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown issue';
      this.logger.warn(`Corrupt data file ${this.filePath} (${where}), treating as empty`);
      return [];
    }

    return result.data.map(fromRecord);
  }

  /**
   * Overwrite the data file with the given series.
   *
   * Writes a sibling temp file and renames it into place. On failure the
   * temp file is removed and the old file stays as it was.
   *
   * @throws {SampleStoreError} When the write or rename fails
   */
  async save(samples: readonly Sample[]): Promise<void> {
    const dir = dirname(this.filePath);
    const tempPath = join(
      dir,
      `.${basename(this.filePath)}.${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2)}.tmp`,
    );
    const content = JSON.stringify(samples.map(toRecord));

    try {
      await this.deps.mkdir(dir);
      await this.deps.writeFile(tempPath, content);
      await this.deps.rename(tempPath, this.filePath);
    } catch (error) {
      await this.deps.rm(tempPath).catch((cleanupError: unknown) => {
        this.logger.debug(`Could not remove temp file ${tempPath}: ${String(cleanupError)}`);
      });
      throw new SampleStoreError(`Failed to write ${this.filePath}`, { cause: error });
    }
  }

  /**
   * Append one sample at `now`, drop everything outside the retention
   * window, and persist. Calls are serialized within this process.
   *
   * @returns The retained series as written
   * @throws {SampleStoreError} When the write fails
   */
  appendAndPrune(value: number, now: number): Promise<Sample[]> {
    const run = this.writeQueue.then(async () => {
      const current = await this.load();
      const next = pruneSamples([...current, { timestamp: now, value }], now, this.retentionSeconds);
      await this.save(next);
      return next;
    });

    // Keep the queue alive after a failed write; the caller sees the error through `run`
    this.writeQueue = run.then(
      () => undefined,
      () => undefined,
    );

    return run;
  }

  /**
   * Create the data file as `[]` if it does not exist yet.
   *
   * @returns true when a file was created
   */
  async ensureInitialized(): Promise<boolean> {
    try {
      await this.deps.readFile(this.filePath);
      return false;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw new SampleStoreError(`Cannot access ${this.filePath}`, { cause: error });
      }
    }

    await this.save([]);
    return true;
  }
}
