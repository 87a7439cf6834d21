/**
 * stats.ts — Summary statistics and chart views over a lot subset
 *
 * Summary figures, mostCommonCategory included, come from lots that have a
 * sold price. Unpriced lots only count toward lotCount and the
 * categoryBreakdown counts.
 */
import { mean, med, safeDiv, TopN } from './helpers.ts';
import { categoryRank } from './categories.ts';
import { estimateDelta } from './query.ts';
import type {
  Category, CategoryBucket, EstimateComparison, HistogramBin, HistogramScale, Lot, SummaryStats,
} from '../types.ts';

export type PricedLot = Lot & { readonly soldPrice: number };

function isPriced(l: Lot): l is PricedLot {
  return l.soldPrice !== null;
}

export function emptySummary(lotCount = 0): SummaryStats {
  return {
    lotCount,
    count: 0,
    total: 0,
    mean: null,
    median: null,
    min: null,
    max: null,
    estimateDeltaMean: null,
    estimateDeltaMedian: null,
    mostExpensive: null,
    cheapest: null,
    mostCommonCategory: null,
  };
}

/** Most frequent category; ties go to the one declared first */
function modeCategory(lots: readonly Lot[]): Category | null {
  const counts = new Map<Category, number>();
  for (const l of lots) counts.set(l.category, (counts.get(l.category) ?? 0) + 1);
  let best: Category | null = null, max = 0;
  for (const [cat, n] of counts) {
    if (n > max || (n === max && best !== null && categoryRank(cat) < categoryRank(best))) {
      best = cat; max = n;
    }
  }
  return best;
}

export function summarize(lots: readonly Lot[]): SummaryStats {
  const priced = lots.filter(isPriced);
  if (priced.length === 0) return emptySummary(lots.length);

  const prices = priced.map(l => l.soldPrice);
  const deltas: number[] = [];
  let total = 0;
  let hi = priced[0], lo = priced[0];
  for (const l of priced) {
    total += l.soldPrice;
    if (hi === undefined || l.soldPrice > hi.soldPrice) hi = l;
    if (lo === undefined || l.soldPrice < lo.soldPrice) lo = l;
    const d = estimateDelta(l);
    if (d !== null) deltas.push(d);
  }

  return {
    lotCount: lots.length,
    count: priced.length,
    total,
    mean: total / priced.length,
    median: med(prices),
    min: lo?.soldPrice ?? null,
    max: hi?.soldPrice ?? null,
    estimateDeltaMean: mean(deltas),
    estimateDeltaMedian: med(deltas),
    mostExpensive: hi ?? null,
    cheapest: lo ?? null,
    mostCommonCategory: modeCategory(priced),
  };
}

/** Per-category counts and sold totals; busiest first, then declaration order */
export function categoryBreakdown(lots: readonly Lot[]): CategoryBucket[] {
  const buckets = new Map<Category, { count: number; priced: number; total: number }>();
  for (const l of lots) {
    const b = buckets.get(l.category) ?? { count: 0, priced: 0, total: 0 };
    b.count++;
    if (l.soldPrice !== null) { b.priced++; b.total += l.soldPrice; }
    buckets.set(l.category, b);
  }
  return [...buckets.entries()]
    .map(([category, b]) => ({ category, ...b, mean: b.priced ? b.total / b.priced : null }))
    .sort((a, b) => b.count - a.count || categoryRank(a.category) - categoryRank(b.category));
}

/** N most expensive (or cheapest) priced lots; equal prices keep input order */
export function topLots(lots: readonly Lot[], n = 10, order: 'expensive' | 'cheapest' = 'expensive'): PricedLot[] {
  const dir = order === 'expensive' ? -1 : 1;
  const top = new TopN<PricedLot>(n, (a, b) => dir * (a.soldPrice - b.soldPrice));
  for (const l of lots) if (isPriced(l)) top.add(l);
  return top.result();
}

/** Estimate midpoint vs sold price for the N most expensive lots */
export function estimateComparison(lots: readonly Lot[], n = 10): EstimateComparison[] {
  return topLots(lots, n, 'expensive').map(l => ({
    title: l.title,
    category: l.category,
    estimateMid: l.estimateMid,
    soldPrice: l.soldPrice,
    delta: estimateDelta(l),
    ratio: l.estimateMid !== null ? safeDiv(l.soldPrice, l.estimateMid) : null,
  }));
}

/**
 * Equal-width bins over sold prices. Log scale bins log10(price + 1) and
 * reports edges back in dollars. The last bin is closed on the right.
 */
export function priceHistogram(lots: readonly Lot[], bins = 30, scale: HistogramScale = 'log'): HistogramBin[] {
  const prices = lots.filter(isPriced).map(l => l.soldPrice);
  if (!prices.length || bins < 1) return [];

  const fwd = scale === 'log' ? (v: number) => Math.log10(v + 1) : (v: number) => v;
  const inv = scale === 'log' ? (v: number) => 10 ** v - 1 : (v: number) => v;

  const xs = prices.map(fwd);
  let min = Infinity, max = -Infinity;
  for (const x of xs) {
    if (x < min) min = x;
    if (x > max) max = x;
  }
  const width = (max - min) / bins || 1;
  const count = max === min ? 1 : bins;

  const out: HistogramBin[] = Array.from({ length: count }, (_, i) => ({
    from: inv(min + i * width),
    to: inv(i === count - 1 && max !== min ? max : min + (i + 1) * width),
    count: 0,
  }));
  for (const x of xs) {
    const i = Math.min(count - 1, Math.floor((x - min) / width));
    const bin = out[i];
    if (bin) bin.count++;
  }
  return out;
}
