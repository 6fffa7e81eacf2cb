import { describe, it, expect } from 'vitest';
import { extractOutcomePrice, parseDecimal, toPercent } from './extract.js';

describe('parseDecimal', () => {
  it('parses plain and signed decimals', () => {
    expect(parseDecimal('0.37')).toBe(0.37);
    expect(parseDecimal('-1.5')).toBe(-1.5);
    expect(parseDecimal('.5')).toBe(0.5);
    expect(parseDecimal('1e-3')).toBe(0.001);
    expect(parseDecimal(' 0.25 ')).toBe(0.25);
  });

  it('rejects non-numeric literals', () => {
    expect(parseDecimal('abc')).toBeNull();
    expect(parseDecimal('')).toBeNull();
    expect(parseDecimal('0x10')).toBeNull();
    expect(parseDecimal('Infinity')).toBeNull();
    expect(parseDecimal('1.2.3')).toBeNull();
  });
});

describe('toPercent', () => {
  it('scales by 100 and rounds to 2 decimals', () => {
    expect(toPercent(0.37)).toBe(37);
    expect(toPercent(0.12346)).toBe(12.35);
    expect(toPercent(0.0051)).toBe(0.51);
    expect(toPercent(1)).toBe(100);
  });

  it('rounds the scaled value once, not its binary approximation twice', () => {
    expect(toPercent(0.00045)).toBe(0.04);
    expect(toPercent(0.00015)).toBe(0.01);
  });

  it('sends exact halfway values to the even cent', () => {
    // 41/32, 13/32 and 3/32 scale to exactly representable x.xx5 values
    expect(toPercent(1.28125)).toBe(128.12);
    expect(toPercent(0.40625)).toBe(40.62);
    expect(toPercent(0.09375)).toBe(9.38);
  });
});

describe('extractOutcomePrice', () => {
  it('stores small prices with the same rounding as the percentage scale', () => {
    expect(extractOutcomePrice('"outcomePrices": ["0.00045"]')).toEqual({ ok: true, value: 0.04 });
    expect(extractOutcomePrice('"outcomePrices": ["0.00015"]')).toEqual({ ok: true, value: 0.01 });
  });

  it('takes the first element of outcomePrices', () => {
    const body = '<script>{"id":"1","outcomePrices": ["0.37", "0.63"],"volume":"10"}</script>';
    expect(extractOutcomePrice(body)).toEqual({ ok: true, value: 37 });
  });

  it('tolerates whitespace and newlines around the array', () => {
    const body = '"outcomePrices":\n  [\n    "0.4215",\n    "0.5785"\n  ]';
    expect(extractOutcomePrice(body)).toEqual({ ok: true, value: 42.15 });
  });

  it('uses the first occurrence when the key appears more than once', () => {
    const body = '"outcomePrices": ["0.10"] ... "outcomePrices": ["0.90"]';
    expect(extractOutcomePrice(body)).toEqual({ ok: true, value: 10 });
  });

  it('reports a missing pattern', () => {
    const result = extractOutcomePrice('<html><body>no market data</body></html>');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('pattern-missing');
    }
  });

  it('reports an unparsable literal instead of throwing', () => {
    const result = extractOutcomePrice('"outcomePrices": ["n/a", "0.5"]');
    expect(result).toEqual({
      ok: false,
      reason: 'invalid-number',
      detail: 'cannot parse "n/a" as a number',
    });
  });

  it('does not match an array of bare numbers', () => {
    const result = extractOutcomePrice('"outcomePrices": [0.37, 0.63]');
    expect(result.ok).toBe(false);
  });
});
