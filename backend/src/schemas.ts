// ═══════════════════════════════════════════════════════
// Zod Schemas — Raw record coercion + API input validation
// ═══════════════════════════════════════════════════════
import { z } from 'zod';
import { CATEGORIES } from './types.ts';

// ── Raw export records ──

// Numbers are read as their decimal text; anything else drops the field.
const rawText = z.union([z.string(), z.number().transform(n => String(n))]).optional().catch(undefined);

export const RawLotSchema = z.object({
  'Title': rawText,
  'Sold Price': rawText,
  'Estimated Price': rawText,
  'Item URL': rawText,
  'Item Image': rawText,
}).catch({});

export const LotDocumentSchema = z.array(z.unknown());

// ── Shared enums ──

export const CategoryEnum = z.enum(CATEGORIES);
export const LotSortEnum = z.enum([
  'price_desc', 'price_asc', 'title_asc', 'title_desc', 'estimate_desc', 'delta_desc',
]);

const price = z.coerce.number().min(0).max(1e12);

// ── Filter params shared by every /lots endpoint ──

export const FilterQuerySchema = z.object({
  categories: z.string().max(1000).optional()
    .transform(s => (s ? s.split(',').map(c => c.trim()).filter(Boolean) : []))
    .pipe(z.array(CategoryEnum)),
  q: z.string().max(200).default(''),
  minPrice: price.optional(),
  maxPrice: price.optional(),
});

export type FilterQueryInput = z.infer<typeof FilterQuerySchema>;

// ── GET /api/lots ──

export const LotsQuerySchema = FilterQuerySchema.extend({
  sort: LotSortEnum.optional(),
  page: z.coerce.number().int().min(1).max(1000).default(1),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export type LotsQueryInput = z.infer<typeof LotsQuerySchema>;

// ── GET /api/lots/top ──

export const TopQuerySchema = FilterQuerySchema.extend({
  n: z.coerce.number().int().min(1).max(100).default(10),
  order: z.enum(['expensive', 'cheapest']).default('expensive'),
});

// ── GET /api/lots/estimates ──

export const EstimatesQuerySchema = FilterQuerySchema.extend({
  n: z.coerce.number().int().min(1).max(100).default(10),
});

// ── GET /api/lots/histogram ──

export const HistogramQuerySchema = FilterQuerySchema.extend({
  bins: z.coerce.number().int().min(1).max(200).default(30),
  scale: z.enum(['linear', 'log']).default('log'),
});
