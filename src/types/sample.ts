/**
 * Sample types and retention constants for the price series.
 *
 * A Sample is one observation of the tracked price. On disk samples are
 * stored as `{ time, price }` records; the zod schema below validates that
 * durable form and the store converts between the two shapes.
 *
 * @module types/sample
 */

import { z } from 'zod';

// ============================================================================
// Constants
// ============================================================================

/** Trailing window kept in the store: 6 hours. */
export const RETENTION_SECONDS = 6 * 60 * 60;

/** Delay between sampler ticks: 10 minutes. */
export const POLL_INTERVAL_SECONDS = 600;

// ============================================================================
// Types
// ============================================================================

/**
 * One observation of the tracked price.
 */
export interface Sample {
  /** Epoch seconds */
  readonly timestamp: number;
  /** Price after the ×100 transform */
  readonly value: number;
}

/**
 * Durable record as written to the data file.
 */
export const SampleRecordSchema = z.object({
  time: z.number().int(),
  price: z.number().finite(),
});

export type SampleRecord = z.infer<typeof SampleRecordSchema>;

/** The whole data file: a JSON array of records. */
export const SampleFileSchema = z.array(SampleRecordSchema);

// ============================================================================
// Conversion
// ============================================================================

export function toRecord(sample: Sample): SampleRecord {
  return { time: sample.timestamp, price: sample.value };
}

export function fromRecord(record: SampleRecord): Sample {
  return { timestamp: record.time, value: record.price };
}

/**
 * Current time in epoch seconds.
 */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
