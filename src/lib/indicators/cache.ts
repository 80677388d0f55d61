// ============================================================
// Indicator Result Cache
// ============================================================
// One entry per (symbol, timeframe, type, params). The entry remembers the
// bar window it was computed for; a new last bar replaces it.
// ============================================================

import type { CacheContext, IndicatorParams, IndicatorResult, IndicatorType } from './types';

interface CacheEntry {
  lastTimestamp: number;
  barCount: number;
  result: IndicatorResult;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
}

export const DEFAULT_CACHE_SIZE = 100;

/**
 * Stable key: params are sorted so {a,b} and {b,a} share an entry
 */
export function buildCacheKey(
  context: CacheContext,
  type: IndicatorType,
  params: IndicatorParams,
): string {
  const paramPart = Object.keys(params)
    .sort()
    .map((k) => `${k}=${params[k]}`)
    .join(',');
  return `${context.symbol}|${context.timeframe}|${type}|${paramPart}`;
}

/**
 * Bounded LRU cache. Map insertion order doubles as recency order.
 */
export class IndicatorResultCache {
  private entries: Map<string, CacheEntry> = new Map();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private readonly maxEntries: number = DEFAULT_CACHE_SIZE) {}

  get(key: string, lastTimestamp: number, barCount: number): IndicatorResult | null {
    const entry = this.entries.get(key);
    if (!entry || entry.lastTimestamp !== lastTimestamp || entry.barCount !== barCount) {
      this.misses++;
      return null;
    }

    // refresh recency
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.result;
  }

  set(key: string, lastTimestamp: number, barCount: number, result: IndicatorResult): void {
    this.entries.delete(key);
    this.entries.set(key, { lastTimestamp, barCount, result });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
