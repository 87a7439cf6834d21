/**
 * query.ts — Lot filtering, sorting, pagination
 *
 * filterLots is a stable filter: output keeps input order. Sorting is a
 * separate step the caller asks for.
 */
import { InvalidCriteriaError } from '../shared/errors.ts';
import type { FilterCriteria, Lot, LotSort, Page } from '../types.ts';

function hasBound(v: number | null | undefined): v is number {
  return v !== null && v !== undefined;
}

/** Throws InvalidCriteriaError when a bound is not a finite number or min > max */
export function validateCriteria(criteria: FilterCriteria): void {
  const { minPrice, maxPrice } = criteria;
  for (const [name, v] of [['minPrice', minPrice], ['maxPrice', maxPrice]] as const) {
    if (hasBound(v) && !Number.isFinite(v)) {
      throw new InvalidCriteriaError(`${name} must be a finite number, got ${v}`);
    }
  }
  if (hasBound(minPrice) && hasBound(maxPrice) && minPrice > maxPrice) {
    throw new InvalidCriteriaError(`minPrice (${minPrice}) must not exceed maxPrice (${maxPrice})`);
  }
}

/**
 * Lots matching every criterion:
 *   categories — empty or absent matches all
 *   keyword    — case-insensitive title substring, empty matches all
 *   price      — inclusive bounds; unpriced lots are dropped only when a bound is set
 */
export function filterLots(lots: readonly Lot[], criteria: FilterCriteria = {}): Lot[] {
  validateCriteria(criteria);
  const { categories = [], keyword = '', minPrice, maxPrice } = criteria;

  const cats = categories.length ? new Set(categories) : null;
  const kw = keyword.toLowerCase();
  const lo = hasBound(minPrice) ? minPrice : null;
  const hi = hasBound(maxPrice) ? maxPrice : null;
  const priced = lo !== null || hi !== null;

  return lots.filter(l => {
    if (cats && !cats.has(l.category)) return false;
    if (kw && !l.title.toLowerCase().includes(kw)) return false;
    if (priced) {
      if (l.soldPrice === null) return false;
      if (lo !== null && l.soldPrice < lo) return false;
      if (hi !== null && l.soldPrice > hi) return false;
    }
    return true;
  });
}

/** Sold price minus estimate midpoint (null when either is unknown) */
export function estimateDelta(l: Lot): number | null {
  return l.soldPrice === null || l.estimateMid === null ? null : l.soldPrice - l.estimateMid;
}

type Key = (l: Lot) => number | string | null;

function byKey(key: Key, dir: 1 | -1): (a: Lot, b: Lot) => number {
  return (a, b) => {
    const ka = key(a), kb = key(b);
    if (ka === null || kb === null) return ka === kb ? 0 : ka === null ? 1 : -1;  // nulls last
    if (typeof ka === 'string' && typeof kb === 'string') return dir * ka.localeCompare(kb);
    return dir * (Number(ka) - Number(kb));
  };
}

const SORTS: Record<LotSort, (a: Lot, b: Lot) => number> = {
  price_desc: byKey(l => l.soldPrice, -1),
  price_asc: byKey(l => l.soldPrice, 1),
  title_asc: byKey(l => l.title.toLowerCase(), 1),
  title_desc: byKey(l => l.title.toLowerCase(), -1),
  estimate_desc: byKey(l => l.estimateMid, -1),
  delta_desc: byKey(estimateDelta, -1),
};

/** Sorted copy; Array.prototype.sort is stable so ties keep input order */
export function sortLots(lots: readonly Lot[], sort: LotSort): Lot[] {
  return [...lots].sort(SORTS[sort]);
}

export function paginate<T>(items: readonly T[], page = 1, limit = 50): Page<T> {
  const total = items.length;
  const pages = Math.ceil(total / limit);
  const start = (page - 1) * limit;
  return { total, page, pages, limit, results: items.slice(start, start + limit) };
}
