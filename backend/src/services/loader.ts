/**
 * loader.ts — Raw export → normalized Lot[]
 *
 * Document-level failures (unreadable file, bad JSON, top level not an
 * array) throw LoadError. Record-level problems never throw: the affected
 * field becomes null and the record is kept.
 */
import { readFileSync } from 'fs';
import { parsePrice, parseEstimate, midpoint } from './helpers.ts';
import { detectCategory, CATEGORY_RULES } from './categories.ts';
import { RawLotSchema, LotDocumentSchema } from '../schemas.ts';
import { LoadError } from '../shared/errors.ts';
import { childLogger } from '../shared/logger.ts';
import { loadDuration, datasetSize } from '../shared/metrics.ts';
import type { CategoryRule, Lot, LotSource, RawLot } from '../types.ts';

const log = childLogger({ module: 'loader' });

/** Count of fields that had text but failed to parse */
export interface NormalizeReport {
  lots: Lot[];
  degraded: number;
}

export function normalizeLot(raw: RawLot, rules: readonly CategoryRule[] = CATEGORY_RULES): Lot {
  const title = raw['Title'] ?? '';
  const estimateText = raw['Estimated Price'] ?? '';
  const range = parseEstimate(estimateText);
  return Object.freeze({
    title,
    soldPrice: parsePrice(raw['Sold Price']),
    estimateLow: range.low,
    estimateHigh: range.high,
    estimateMid: midpoint(range),
    estimateText,
    category: detectCategory(title, rules),
    url: raw['Item URL'] ?? '',
    imageUrl: raw['Item Image'] ?? '',
  });
}

/** Normalize untrusted array elements; one output per input, in order */
export function normalizeLots(items: readonly unknown[], rules: readonly CategoryRule[] = CATEGORY_RULES): NormalizeReport {
  let degraded = 0;
  const lots = items.map(item => {
    const raw = RawLotSchema.parse(item);
    const lot = normalizeLot(raw, rules);
    if (raw['Sold Price'] && lot.soldPrice === null) degraded++;
    if (raw['Estimated Price'] && lot.estimateLow === null) degraded++;
    return lot;
  });
  return { lots, degraded };
}

/** Parse a JSON document into lots. Throws LoadError on document-level failure. */
export function parseLotDocument(text: string, label = '<memory>', rules: readonly CategoryRule[] = CATEGORY_RULES): readonly Lot[] {
  let doc: unknown;
  try {
    doc = JSON.parse(text.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new LoadError(`Could not load data: ${label} is not valid JSON`, label, { cause: err });
  }

  const parsed = LotDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new LoadError(`Could not load data: ${label} must contain a JSON array of lots`, label);
  }

  const { lots, degraded } = normalizeLots(parsed.data, rules);
  if (degraded > 0) log.debug({ source: label, degraded }, 'Unparseable price fields set to null');
  datasetSize.set({ kind: 'lots' }, lots.length);
  datasetSize.set({ kind: 'degraded_fields' }, degraded);
  return Object.freeze(lots);
}

export function sourceLabel(source: LotSource): string {
  return 'path' in source ? source.path : (source.label ?? '<memory>');
}

/** Read and normalize a dataset from a file or an in-memory blob */
export function loadLots(source: LotSource, rules: readonly CategoryRule[] = CATEGORY_RULES): readonly Lot[] {
  const label = sourceLabel(source);
  const end = loadDuration.startTimer();

  let text: string;
  if ('path' in source) {
    try {
      text = readFileSync(source.path, 'utf-8');
    } catch (err) {
      end({ status: 'error' });
      throw new LoadError(`Could not load data: cannot read ${label}`, label, { cause: err });
    }
  } else {
    text = typeof source.text === 'string' ? source.text : source.text.toString('utf-8');
  }

  try {
    const lots = parseLotDocument(text, label, rules);
    end({ status: 'ok' });
    log.info({ source: label, lots: lots.length }, 'Dataset loaded');
    return lots;
  } catch (err) {
    end({ status: 'error' });
    throw err;
  }
}
