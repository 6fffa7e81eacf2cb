/**
 * Price extraction from a fetched page body.
 *
 * The page embeds market data as JSON somewhere in its HTML. The default
 * extractor looks for the first `"outcomePrices": ["<number>", ...]`
 * occurrence and converts that probability into a percentage.
 *
 * Pure functions: string in, result out.
 *
 * @module source/extract
 */

// ============================================================================
// Types
// ============================================================================

export type ExtractResult =
  | { ok: true; value: number }
  | { ok: false; reason: 'pattern-missing' | 'invalid-number'; detail: string };

/**
 * Strategy for pulling the price out of a page body.
 * Swap it to change how the page is read without touching the sampler or store.
 */
export type PriceExtractor = (body: string) => ExtractResult;

// ============================================================================
// Constants
// ============================================================================

/** First string element of the outcomePrices array. */
export const OUTCOME_PRICES_PATTERN = /"outcomePrices":\s*\[\s*"([^"]+)"/;

/** Plain decimal with optional sign and exponent. */
const DECIMAL_LITERAL = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse a decimal literal, or return null when it is not one.
 */
export function parseDecimal(literal: string): number | null {
  const trimmed = literal.trim();
  if (!DECIMAL_LITERAL.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

const EXACT_HALF_CENT = /^-?\d+\.\d{2}50*$/;

/**
 * Scale a probability to a percentage rounded to 2 decimals.
 *
 * Rounds the exact binary value of the scaled number once. toFixed(100)
 * prints that value in full, so a true halfway case can be told apart
 * and goes to the even cent; toFixed(2) alone would round it up.
 */
export function toPercent(probability: number): number {
  const scaled = probability * 100;
  const exact = scaled.toFixed(100);

  if (EXACT_HALF_CENT.test(exact)) {
    const truncated = exact.slice(0, exact.indexOf('.') + 3);
    const lastDigit = Number(truncated[truncated.length - 1]);
    if (lastDigit % 2 === 0) {
      return Number(truncated);
    }
  }

  return Number(scaled.toFixed(2));
}

// ============================================================================
// Default extractor
// ============================================================================

export const extractOutcomePrice: PriceExtractor = (body) => {
  const match = OUTCOME_PRICES_PATTERN.exec(body);
  if (!match) {
    return { ok: false, reason: 'pattern-missing', detail: 'no "outcomePrices" array in response body' };
  }

  const literal = match[1];
  const parsed = parseDecimal(literal);
  if (parsed === null) {
    return { ok: false, reason: 'invalid-number', detail: `cannot parse "${literal}" as a number` };
  }

  return { ok: true, value: toPercent(parsed) };
};
