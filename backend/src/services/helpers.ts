// ═══════════════════════════════════════════════════════
// helpers.ts — Pure utility functions (zero dependencies)
// ═══════════════════════════════════════════════════════
import type { EstimateRange } from '../types.ts';

// Plain digits, or digits grouped in threes by commas
const AMOUNT = /^(\d{1,3}(,\d{3})+|\d+)(\.\d+)?$/;

/** Parse "$1,000" → 1000. Anything else (other currencies, negatives, "12,34", "1,000 / 2,000") → null */
export function parsePrice(text: string | null | undefined): number | null {
  if (!text) return null;
  const s = text.replace(/\$/g, '').trim();
  if (!AMOUNT.test(s)) return null;
  const n = parseFloat(s.replace(/,/g, ''));
  return Number.isFinite(n) ? n : null;
}

/** Parse "$800-1,200" → { low: 800, high: 1200 }; "$500" → { low: 500, high: 500 } */
export function parseEstimate(text: string | null | undefined): EstimateRange {
  const none: EstimateRange = { low: null, high: null };
  if (!text) return none;
  const parts = text.split('-');
  if (parts.length > 2) return none;
  if (parts.length === 1) {
    const v = parsePrice(parts[0]);
    return v === null ? none : { low: v, high: v };
  }
  const low = parsePrice(parts[0]);
  const high = parsePrice(parts[1]);
  if (low === null || high === null || low > high) return none;
  return { low, high };
}

/** Midpoint of an estimate range (null unless both bounds are known) */
export function midpoint(range: EstimateRange): number | null {
  if (range.low === null || range.high === null) return null;
  return (range.low + range.high) / 2;
}

/** Safe mean (null for empty) */
export function mean(arr: readonly number[]): number | null {
  if (!arr.length) return null;
  return arr.reduce((s, v) => s + v, 0) / arr.length;
}

/** Median of numeric array (null for empty; even sizes average the middle pair) */
export function med(arr: readonly number[]): number | null {
  if (!arr.length) return null;
  const s = [...arr].sort((a, b) => a - b);
  const m = Math.floor(s.length / 2);
  const hi = s[m] ?? 0;
  if (s.length % 2) return hi;
  const lo = s[m - 1] ?? hi;
  return (lo + hi) / 2;
}

/** Safe division with configurable decimal places */
export function safeDiv(num: number, den: number, decimals = 2): number | null {
  if (den === 0) return null;
  return +((num / den).toFixed(decimals));
}

/**
 * Bounded top-N sorted collection.
 * Ties keep insertion order, so the result is stable for equal keys.
 */
export class TopN<T> {
  private items: T[] = [];
  private readonly max: number;
  private readonly cmp: (a: T, b: T) => number;

  constructor(max: number, cmp: (a: T, b: T) => number) {
    this.max = max;
    this.cmp = cmp;
  }

  add(item: T): void {
    if (this.max <= 0) return;
    const last = this.items[this.items.length - 1];
    if (this.items.length >= this.max && last !== undefined && this.cmp(item, last) >= 0) return;
    let i = this.items.length;
    while (i > 0) {
      const prev = this.items[i - 1];
      if (prev === undefined || this.cmp(item, prev) >= 0) break;
      i--;
    }
    this.items.splice(i, 0, item);
    if (this.items.length > this.max) this.items.pop();
  }

  result(): T[] { return this.items; }
}
