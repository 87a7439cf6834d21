import express, { type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import { filterLots, sortLots, paginate } from '../services/query.ts';
import { summarize, categoryBreakdown, topLots, estimateComparison, priceHistogram } from '../services/stats.ts';
import { CATEGORY_RULES } from '../services/categories.ts';
import { FALLBACK_CATEGORY } from '../types.ts';
import {
  FilterQuerySchema, LotsQuerySchema, TopQuerySchema, EstimatesQuerySchema, HistogramQuerySchema,
  type FilterQueryInput,
} from '../schemas.ts';
import type { LotCache } from '../services/lot-cache.ts';
import type { FilterCriteria, Lot, LotSource } from '../types.ts';

export interface LotsRouterDeps {
  cache: LotCache;
  source: LotSource;
}

// ── Zod validation wrapper ──

function validated<T extends z.ZodTypeAny>(
  schema: T,
  handler: (input: z.infer<T>, req: Request, res: Response) => void,
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      const errors = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      res.status(400).json({ success: false, error: 'Validation failed', details: errors });
      return;
    }
    try {
      handler(result.data, req, res);
    } catch (err) { next(err); }
  };
}

export function toCriteria(q: FilterQueryInput): FilterCriteria {
  return { categories: q.categories, keyword: q.q, minPrice: q.minPrice, maxPrice: q.maxPrice };
}

export function createLotsRouter({ cache, source }: LotsRouterDeps): express.Router {
  const router = express.Router();
  const all = (): readonly Lot[] => cache.get(source);
  const subset = (q: FilterQueryInput): Lot[] => filterLots(all(), toCriteria(q));

  /**
   * GET /api/lots — Filtered, optionally sorted, paginated lots
   */
  router.get('/lots', validated(LotsQuerySchema, (q, _req, res) => {
    const lots = subset(q);
    const ordered = q.sort ? sortLots(lots, q.sort) : lots;
    res.json({ success: true, data: paginate(ordered, q.page, q.limit) });
  }));

  /**
   * GET /api/lots/summary — Count, total, mean, median, min/max, estimate deltas
   */
  router.get('/lots/summary', validated(FilterQuerySchema, (q, _req, res) => {
    res.json({ success: true, data: summarize(subset(q)) });
  }));

  /**
   * GET /api/lots/top — Most expensive / cheapest lots (bar charts, gallery)
   */
  router.get('/lots/top', validated(TopQuerySchema, (q, _req, res) => {
    res.json({ success: true, data: topLots(subset(q), q.n, q.order) });
  }));

  /**
   * GET /api/lots/estimates — Estimate vs sold for the top lots (dumbbell chart)
   */
  router.get('/lots/estimates', validated(EstimatesQuerySchema, (q, _req, res) => {
    res.json({ success: true, data: estimateComparison(subset(q), q.n) });
  }));

  /**
   * GET /api/lots/histogram — Sold price distribution
   */
  router.get('/lots/histogram', validated(HistogramQuerySchema, (q, _req, res) => {
    res.json({ success: true, data: priceHistogram(subset(q), q.bins, q.scale) });
  }));

  /**
   * GET /api/categories — Category list (declaration order) + breakdown of the full dataset
   */
  router.get('/categories', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({
        success: true,
        data: {
          categories: [...CATEGORY_RULES.map(r => r.category), FALLBACK_CATEGORY],
          breakdown: categoryBreakdown(all()),
        },
      });
    } catch (err) { next(err); }
  });

  /**
   * POST /api/refresh — Drop the cached dataset and reload it
   */
  router.post('/refresh', (req: Request, res: Response, next: NextFunction) => {
    try {
      const dropped = cache.invalidate(source);
      const lots = all();
      req.log?.info({ dropped, lots: lots.length }, 'Dataset refreshed');
      res.json({ success: true, data: { lots: lots.length, cache: cache.stats() } });
    } catch (err) { next(err); }
  });

  return router;
}
