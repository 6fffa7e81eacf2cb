/**
 * Tests for the JSON-file sample store.
 *
 * Covers:
 * - Missing/corrupt/invalid files read as empty
 * - save + load round trip
 * - Retention pruning on append
 * - Atomic writes and failure handling
 * - Write serialization
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, readFile, writeFile, readdir, rename } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { SampleStore, SampleStoreError, pruneSamples, type SampleStoreDeps } from './sample-store.js';
import type { Sample } from '../types/sample.js';

describe('SampleStore', () => {
  let testDir: string;
  let dataPath: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `sample-store-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    dataPath = join(testDir, 'price_data.json');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('returns an empty series when the file does not exist', async () => {
      const store = new SampleStore(dataPath);
      expect(await store.load()).toEqual([]);
    });

    it('returns an empty series for invalid JSON', async () => {
      await writeFile(dataPath, '[{"time": 1, "pri', 'utf-8');
      const store = new SampleStore(dataPath);
      expect(await store.load()).toEqual([]);
    });

    it('returns an empty series when the top level is not an array', async () => {
      await writeFile(dataPath, '{"time": 1, "price": 2}', 'utf-8');
      const store = new SampleStore(dataPath);
      expect(await store.load()).toEqual([]);
    });

    it('returns an empty series when a record has the wrong shape', async () => {
      await writeFile(dataPath, '[{"time": 1, "price": 2}, {"time": "soon", "price": 3}]', 'utf-8');
      const warn = vi.fn();
      const store = new SampleStore(dataPath, {
        logger: { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() },
      });

      expect(await store.load()).toEqual([]);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('reads records written by other tools', async () => {
      await writeFile(dataPath, '[{"time": 100, "price": 37.5}, {"time": 700, "price": 38}]', 'utf-8');
      const store = new SampleStore(dataPath);
      expect(await store.load()).toEqual([
        { timestamp: 100, value: 37.5 },
        { timestamp: 700, value: 38 },
      ]);
    });
  });

  describe('save', () => {
    it('round-trips a series', async () => {
      const store = new SampleStore(dataPath);
      const samples: Sample[] = [
        { timestamp: 1_700_000_000, value: 41.25 },
        { timestamp: 1_700_000_600, value: 41.25 },
        { timestamp: 1_700_000_600, value: 40 },
      ];

      await store.save(samples);
      expect(await store.load()).toEqual(samples);
    });

    it('round-trips the empty series', async () => {
      const store = new SampleStore(dataPath);
      await store.save([]);
      expect(await store.load()).toEqual([]);
      expect(await readFile(dataPath, 'utf-8')).toBe('[]');
    });

    it('writes the time/price record format', async () => {
      const store = new SampleStore(dataPath);
      await store.save([{ timestamp: 0, value: 40 }]);
      expect(await readFile(dataPath, 'utf-8')).toBe('[{"time":0,"price":40}]');
    });

    it('leaves no temp files behind', async () => {
      const store = new SampleStore(dataPath);
      await store.save([{ timestamp: 1, value: 1 }]);
      await store.save([{ timestamp: 2, value: 2 }]);
      expect(await readdir(testDir)).toEqual(['price_data.json']);
    });

    it('creates the parent directory', async () => {
      const nestedPath = join(testDir, 'nested', 'data', 'price_data.json');
      const store = new SampleStore(nestedPath);
      await store.save([{ timestamp: 5, value: 50 }]);
      expect(await store.load()).toEqual([{ timestamp: 5, value: 50 }]);
    });

    it('keeps the previous file and removes the temp file when the rename fails', async () => {
      await writeFile(dataPath, '[{"time":1,"price":10}]', 'utf-8');
      const removed: string[] = [];
      const deps: SampleStoreDeps = {
        readFile: (path) => readFile(path, 'utf-8'),
        writeFile: (path, data) => writeFile(path, data, 'utf-8'),
        rename: async () => {
          throw Object.assign(new Error('EXDEV: cross-device link not permitted'), { code: 'EXDEV' });
        },
        rm: async (path) => {
          removed.push(path);
          await rm(path, { force: true });
        },
        mkdir: (path) => mkdir(path, { recursive: true }),
      };
      const store = new SampleStore(dataPath, { deps });

      await expect(store.save([{ timestamp: 2, value: 20 }])).rejects.toBeInstanceOf(SampleStoreError);

      expect(await readFile(dataPath, 'utf-8')).toBe('[{"time":1,"price":10}]');
      expect(removed).toHaveLength(1);
      expect(await readdir(testDir)).toEqual(['price_data.json']);
    });
  });

  describe('appendAndPrune', () => {
    it('follows the retention window across a day of ticks', async () => {
      const store = new SampleStore(dataPath);

      await store.appendAndPrune(40, 0);
      expect(await store.load()).toEqual([{ timestamp: 0, value: 40 }]);

      await store.appendAndPrune(42, 601);
      expect(await store.load()).toEqual([
        { timestamp: 0, value: 40 },
        { timestamp: 601, value: 42 },
      ]);

      const retained = await store.appendAndPrune(50, 21_700);
      expect(retained).toEqual([
        { timestamp: 601, value: 42 },
        { timestamp: 21_700, value: 50 },
      ]);
      expect(await store.load()).toEqual(retained);
    });

    it('keeps a sample exactly at the cutoff', async () => {
      const store = new SampleStore(dataPath);
      await store.appendAndPrune(1, 100);
      const retained = await store.appendAndPrune(2, 100 + 21_600);
      expect(retained.map(s => s.timestamp)).toEqual([100, 21_700]);
    });

    it('keeps exactly the samples inside the window after many appends', async () => {
      const store = new SampleStore(dataPath);
      const times = [0, 3_000, 9_000, 15_000, 22_000, 27_000, 30_000, 36_500];

      for (const [i, t] of times.entries()) {
        await store.appendAndPrune(i, t);
      }

      const last = times[times.length - 1];
      const expected = times
        .map((t, i) => ({ timestamp: t, value: i }))
        .filter(s => s.timestamp >= last - 21_600);
      expect(await store.load()).toEqual(expected);
      expect(expected.map(s => s.timestamp)).toEqual([15_000, 22_000, 27_000, 30_000, 36_500]);
    });

    it('honours a custom retention window', async () => {
      const store = new SampleStore(dataPath, { retentionSeconds: 60 });
      await store.appendAndPrune(1, 0);
      await store.appendAndPrune(2, 30);
      expect(await store.appendAndPrune(3, 90)).toEqual([
        { timestamp: 30, value: 2 },
        { timestamp: 90, value: 3 },
      ]);
    });

    it('starts from an empty series when the file is corrupt', async () => {
      await writeFile(dataPath, 'not json at all', 'utf-8');
      const store = new SampleStore(dataPath);
      expect(await store.appendAndPrune(37, 1000)).toEqual([{ timestamp: 1000, value: 37 }]);
    });

    it('serializes concurrent appends', async () => {
      const store = new SampleStore(dataPath);

      await Promise.all([
        store.appendAndPrune(1, 10),
        store.appendAndPrune(2, 20),
        store.appendAndPrune(3, 30),
      ]);

      expect(await store.load()).toEqual([
        { timestamp: 10, value: 1 },
        { timestamp: 20, value: 2 },
        { timestamp: 30, value: 3 },
      ]);
    });

    it('keeps accepting writes after a failed one', async () => {
      let failNext = true;
      const deps: SampleStoreDeps = {
        readFile: (path) => readFile(path, 'utf-8'),
        writeFile: async (path, data) => {
          if (failNext) {
            failNext = false;
            throw new Error('ENOSPC: no space left on device');
          }
          await writeFile(path, data, 'utf-8');
        },
        rename: (from, to) => rename(from, to),
        rm: (path) => rm(path, { force: true }),
        mkdir: (path) => mkdir(path, { recursive: true }),
      };
      const store = new SampleStore(dataPath, { deps });

      await expect(store.appendAndPrune(1, 10)).rejects.toThrow(SampleStoreError);
      expect(await store.appendAndPrune(2, 20)).toEqual([{ timestamp: 20, value: 2 }]);
    });
  });

  describe('ensureInitialized', () => {
    it('creates an empty data file once', async () => {
      const store = new SampleStore(dataPath);

      expect(await store.ensureInitialized()).toBe(true);
      expect(await readFile(dataPath, 'utf-8')).toBe('[]');
      expect(await store.ensureInitialized()).toBe(false);
    });

    it('leaves an existing file alone', async () => {
      await writeFile(dataPath, '[{"time":1,"price":2}]', 'utf-8');
      const store = new SampleStore(dataPath);

      expect(await store.ensureInitialized()).toBe(false);
      expect(await readFile(dataPath, 'utf-8')).toBe('[{"time":1,"price":2}]');
    });
  });
});

describe('pruneSamples', () => {
  it('drops samples older than the window and keeps order', () => {
    const samples: Sample[] = [
      { timestamp: 0, value: 40 },
      { timestamp: 601, value: 42 },
      { timestamp: 21_700, value: 50 },
    ];
    expect(pruneSamples(samples, 21_700)).toEqual([
      { timestamp: 601, value: 42 },
      { timestamp: 21_700, value: 50 },
    ]);
  });

  it('does not mutate its input', () => {
    const samples: Sample[] = [{ timestamp: 0, value: 1 }];
    pruneSamples(samples, 100_000);
    expect(samples).toEqual([{ timestamp: 0, value: 1 }]);
  });
});
