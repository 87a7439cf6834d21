// ═══════════════════════════════════════════════════════
// Lot Analytics — Core Type Definitions
// Every data shape used across the platform.
// ═══════════════════════════════════════════════════════

// ── Raw export shape ──

export interface RawLot {
  'Title'?: string;
  'Sold Price'?: string;       // "$1,000"
  'Estimated Price'?: string;  // "$800-1,200" | "$500"
  'Item URL'?: string;
  'Item Image'?: string;
}

// ── Categories ──

export const CATEGORIES = [
  'Scripts & Screenplays',
  'Cameras & Camcorders',
  'Lighting Equipment',
  'Books & Reference',
  'Posters & Prints',
  'Furniture',
  'Coffee & Kitchen',
  'Instruments & Audio',
  'Records & Music',
  'Props & Memorabilia',
  'Uncategorized',
] as const;

export type Category = typeof CATEGORIES[number];

export const FALLBACK_CATEGORY: Category = 'Uncategorized';

export interface CategoryRule {
  category: Category;
  keywords: readonly string[];
}

// ── Normalized records ──

export interface Lot {
  readonly title: string;
  readonly soldPrice: number | null;
  readonly estimateLow: number | null;
  readonly estimateHigh: number | null;
  readonly estimateMid: number | null;
  readonly estimateText: string;
  readonly category: Category;
  readonly url: string;
  readonly imageUrl: string;
}

export interface EstimateRange {
  low: number | null;
  high: number | null;
}

/** Where a dataset comes from: a file on disk or an in-memory blob */
export type LotSource =
  | { path: string }
  | { text: string | Buffer; label?: string };

// ── Query ──

export interface FilterCriteria {
  categories?: readonly Category[];
  keyword?: string;
  minPrice?: number | null;
  maxPrice?: number | null;
}

export type LotSort =
  | 'price_desc' | 'price_asc'
  | 'title_asc' | 'title_desc'
  | 'estimate_desc' | 'delta_desc';

export interface Page<T> {
  total: number;
  page: number;
  pages: number;
  limit: number;
  results: T[];
}

// ── Statistics ──

export interface SummaryStats {
  lotCount: number;               // every lot in the subset, priced or not
  count: number;                  // lots with a sold price
  total: number;
  mean: number | null;
  median: number | null;
  min: number | null;
  max: number | null;
  estimateDeltaMean: number | null;
  estimateDeltaMedian: number | null;
  mostExpensive: Lot | null;
  cheapest: Lot | null;
  mostCommonCategory: Category | null;
}

export interface CategoryBucket {
  category: Category;
  count: number;
  priced: number;
  total: number;
  mean: number | null;
}

export interface EstimateComparison {
  title: string;
  category: Category;
  estimateMid: number | null;
  soldPrice: number;
  delta: number | null;
  ratio: number | null;
}

export type HistogramScale = 'linear' | 'log';

export interface HistogramBin {
  from: number;
  to: number;
  count: number;
}

// ── Cache ──

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
}
