import { describe, it, expect } from 'vitest';
import {
  summarize, emptySummary, categoryBreakdown, topLots, estimateComparison, priceHistogram,
} from '../services/stats.ts';
import { filterLots } from '../services/query.ts';
import { normalizeLot } from '../services/loader.ts';
import type { Lot } from '../types.ts';

const lot = (title: string, sold?: string, estimate?: string): Lot =>
  normalizeLot({ 'Title': title, 'Sold Price': sold, 'Estimated Price': estimate });

// Five lots, one unpriced
const FIVE: Lot[] = [
  lot('Desk chair', '$100', '$50-150'),
  lot('Poster', '$200', '$200'),
  lot('Snare drum', undefined, '$300-500'),
  lot('Sofa', '$300'),
  lot('Camera', '$400', '$500-700'),
];

describe('summarize', () => {
  it('computes count, total, mean, median, min and max over priced lots', () => {
    const s = summarize(filterLots(FIVE, {}));
    expect(s.lotCount).toBe(5);
    expect(s.count).toBe(4);
    expect(s.total).toBe(1000);
    expect(s.mean).toBe(250);
    expect(s.median).toBe(250);
    expect(s.min).toBe(100);
    expect(s.max).toBe(400);
  });

  it('reports estimate deltas against the midpoint', () => {
    // Desk chair 100 - 100 = 0, Poster 200 - 200 = 0, Camera 400 - 600 = -200
    const s = summarize(FIVE);
    expect(s.estimateDeltaMean).toBeCloseTo(-66.667, 3);
    expect(s.estimateDeltaMedian).toBe(0);
  });

  it('names the most expensive, cheapest and most common category', () => {
    const s = summarize(FIVE);
    expect(s.mostExpensive?.title).toBe('Camera');
    expect(s.cheapest?.title).toBe('Desk chair');
    expect(s.mostCommonCategory).toBe('Furniture');
  });

  it('breaks category ties by declaration order', () => {
    const s = summarize([lot('Vinyl', '$10'), lot('Book', '$10')]);
    expect(s.mostCommonCategory).toBe('Books & Reference');
  });

  it('takes the most common category from priced lots only', () => {
    const s = summarize([lot('Snare drum'), lot('Bass guitar', 'Passed'), lot('Sofa', '$10')]);
    expect(s.mostCommonCategory).toBe('Furniture');
    expect(categoryBreakdown([lot('Snare drum'), lot('Bass guitar', 'Passed'), lot('Sofa', '$10')])[0]?.category)
      .toBe('Instruments & Audio');
  });

  it('keeps the first of equal prices as most expensive and cheapest', () => {
    const s = summarize([lot('a', '$10'), lot('b', '$10')]);
    expect(s.mostExpensive?.title).toBe('a');
    expect(s.cheapest?.title).toBe('a');
  });

  it('returns the empty result for no lots', () => {
    expect(summarize([])).toEqual(emptySummary());
    expect(summarize([])).toEqual({
      lotCount: 0,
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
    });
  });

  it('returns the empty result when no lot has a price', () => {
    const s = summarize([lot('Snare drum'), lot('Sofa', 'Passed')]);
    expect(s).toEqual(emptySummary(2));
    expect(s.lotCount).toBe(2);
  });

  it('leaves deltas null when no lot has an estimate', () => {
    const s = summarize([lot('Sofa', '$300')]);
    expect(s.estimateDeltaMean).toBeNull();
    expect(s.estimateDeltaMedian).toBeNull();
    expect(s.median).toBe(300);
  });
});

describe('categoryBreakdown', () => {
  it('groups counts and totals, busiest category first', () => {
    expect(categoryBreakdown(FIVE)).toEqual([
      { category: 'Furniture', count: 2, priced: 2, total: 400, mean: 200 },
      { category: 'Cameras & Camcorders', count: 1, priced: 1, total: 400, mean: 400 },
      { category: 'Posters & Prints', count: 1, priced: 1, total: 200, mean: 200 },
      { category: 'Instruments & Audio', count: 1, priced: 0, total: 0, mean: null },
    ]);
  });

  it('is empty for no lots', () => {
    expect(categoryBreakdown([])).toEqual([]);
  });
});

describe('topLots', () => {
  it('returns the most expensive priced lots', () => {
    expect(topLots(FIVE, 2).map(l => l.title)).toEqual(['Camera', 'Sofa']);
  });

  it('returns the cheapest priced lots', () => {
    expect(topLots(FIVE, 3, 'cheapest').map(l => l.title)).toEqual(['Desk chair', 'Poster', 'Sofa']);
  });

  it('never includes unpriced lots', () => {
    expect(topLots(FIVE, 10)).toHaveLength(4);
  });
});

describe('estimateComparison', () => {
  it('compares sold price with the estimate midpoint', () => {
    expect(estimateComparison(FIVE, 2)).toEqual([
      { title: 'Camera', category: 'Cameras & Camcorders', estimateMid: 600, soldPrice: 400, delta: -200, ratio: 0.67 },
      { title: 'Sofa', category: 'Furniture', estimateMid: null, soldPrice: 300, delta: null, ratio: null },
    ]);
  });
});

describe('priceHistogram', () => {
  it('bins linearly with the last bin closed', () => {
    expect(priceHistogram(FIVE, 3, 'linear')).toEqual([
      { from: 100, to: 200, count: 1 },
      { from: 200, to: 300, count: 1 },
      { from: 300, to: 400, count: 2 },
    ]);
  });

  it('puts every priced lot in exactly one bin', () => {
    const bins = priceHistogram(FIVE, 30, 'log');
    expect(bins).toHaveLength(30);
    expect(bins.reduce((s, b) => s + b.count, 0)).toBe(4);
    expect(bins[0]?.from).toBeCloseTo(100, 6);
    expect(bins[29]?.to).toBeCloseTo(400, 6);
  });

  it('uses a single bin when all prices are equal', () => {
    expect(priceHistogram([lot('a', '$50'), lot('b', '$50')], 10, 'linear')).toEqual([
      { from: 50, to: 51, count: 2 },
    ]);
  });

  it('handles a few hundred thousand lots', () => {
    const cheap = lot('a', '$100'), dear = lot('b', '$300');
    const many = Array.from({ length: 300_000 }, (_, i) => (i % 2 ? dear : cheap));
    expect(priceHistogram(many, 2, 'linear')).toEqual([
      { from: 100, to: 200, count: 150_000 },
      { from: 200, to: 300, count: 150_000 },
    ]);
  });

  it('is empty without priced lots', () => {
    expect(priceHistogram([lot('Snare drum')])).toEqual([]);
  });
});
