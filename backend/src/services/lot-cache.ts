/**
 * services/lot-cache.ts — Load-once dataset cache
 *
 * Owned by whoever constructs it (the app creates one per process); there is
 * no module-level singleton. Path sources stay cached while the file's
 * mtime and size are unchanged. In-memory sources are keyed by content hash.
 *
 * Key naming convention:
 *   file:{path}   — dataset read from disk
 *   text:{hash}   — dataset parsed from a blob
 */
import { statSync } from 'fs';
import { resolve } from 'path';
import { createHash } from 'crypto';
import { loadLots, sourceLabel } from './loader.ts';
import { CATEGORY_RULES } from './categories.ts';
import { LoadError } from '../shared/errors.ts';
import { childLogger } from '../shared/logger.ts';
import { cacheOperations } from '../shared/metrics.ts';
import type { CacheStats, CategoryRule, Lot, LotSource } from '../types.ts';

interface Entry {
  lots: readonly Lot[];
  stamp: string;
}

const log = childLogger({ module: 'lot-cache' });

export class LotCache {
  private entries = new Map<string, Entry>();
  private hits = 0;
  private misses = 0;
  private readonly rules: readonly CategoryRule[];

  constructor(rules: readonly CategoryRule[] = CATEGORY_RULES) {
    this.rules = rules;
  }

  /**
   * Cached lots for a source, loading on first use or when the file changed.
   * Throws LoadError like loadLots; failures are not cached.
   */
  get(source: LotSource): readonly Lot[] {
    const { key, stamp } = this.identify(source);
    const entry = this.entries.get(key);
    if (entry && entry.stamp === stamp) {
      this.hits++;
      cacheOperations.inc({ operation: 'hit' });
      return entry.lots;
    }

    this.misses++;
    cacheOperations.inc({ operation: 'miss' });
    if (entry) log.info({ source: sourceLabel(source) }, 'Source changed, reloading');

    const lots = loadLots(source, this.rules);
    this.entries.set(key, { lots, stamp });
    return lots;
  }

  /**
   * Drop the entry for a path or source, or every entry when called without
   * arguments. In-memory sources stay cached until dropped here.
   */
  invalidate(target?: string | LotSource): number {
    let dropped: number;
    let label = '*';
    if (target === undefined) {
      dropped = this.entries.size;
      this.entries.clear();
    } else {
      const source: LotSource = typeof target === 'string' ? { path: target } : target;
      label = sourceLabel(source);
      dropped = this.entries.delete(keyOf(source)) ? 1 : 0;
    }
    cacheOperations.inc({ operation: 'invalidate' });
    log.debug({ source: label, dropped }, 'Cache invalidated');
    return dropped;
  }

  stats(): CacheStats {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }

  private identify(source: LotSource): { key: string; stamp: string } {
    const key = keyOf(source);
    if ('path' in source) {
      try {
        const st = statSync(resolve(source.path));
        return { key, stamp: `${st.mtimeMs}:${st.size}` };
      } catch (err) {
        this.entries.delete(key);
        throw new LoadError(`Could not load data: cannot read ${source.path}`, source.path, { cause: err });
      }
    }
    return { key, stamp: key };
  }
}

function keyOf(source: LotSource): string {
  if ('path' in source) return `file:${resolve(source.path)}`;
  return `text:${createHash('md5').update(source.text).digest('hex')}`;
}
