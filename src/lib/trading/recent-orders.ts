// ============================================================
// Recent Order Cache
// ============================================================
// Duplicate suppression by symbol:side:quantity. Entries older than the
// window are evicted whenever the cache is consulted; there is no timer.
// ============================================================

import type { OrderRequest } from './types'

export const DEFAULT_DUPLICATE_WINDOW_MS = 5000
export const DEFAULT_MAX_RECENT_ORDERS = 1000

export interface DuplicateCheck {
  duplicate: boolean
  dedupKey: string
  /** ms since the matching entry, when duplicate */
  ageMs?: number
}

export function buildDedupKey(order: Pick<OrderRequest, 'symbol' | 'side' | 'quantity'>): string {
  return `${order.symbol}:${order.side}:${order.quantity}`
}

export class RecentOrderCache {
  // insertion order == lastSeen order, refreshed entries move to the end
  private entries: Map<string, number> = new Map()

  constructor(
    private readonly windowMs: number = DEFAULT_DUPLICATE_WINDOW_MS,
    private readonly maxEntries: number = DEFAULT_MAX_RECENT_ORDERS,
  ) {}

  /**
   * Check `order` against the window and record it when it is not a duplicate
   */
  checkAndRecord(order: Pick<OrderRequest, 'symbol' | 'side' | 'quantity'>, now: number): DuplicateCheck {
    this.prune(now)

    const dedupKey = buildDedupKey(order)
    const lastSeen = this.entries.get(dedupKey)
    if (lastSeen !== undefined && now - lastSeen < this.windowMs) {
      return { duplicate: true, dedupKey, ageMs: now - lastSeen }
    }

    this.entries.delete(dedupKey)
    this.entries.set(dedupKey, now)

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
    }

    return { duplicate: false, dedupKey }
  }

  /**
   * Give a slot back, e.g. after the broker refused the order. Only the
   * entry recorded at `recordedAt` is removed; a newer order holding the
   * same key keeps it.
   */
  release(dedupKey: string, recordedAt: number): boolean {
    if (this.entries.get(dedupKey) !== recordedAt) return false
    return this.entries.delete(dedupKey)
  }

  /** Drop entries that fell out of the window; returns how many */
  prune(now: number): number {
    let removed = 0
    for (const [key, lastSeen] of this.entries) {
      if (now - lastSeen < this.windowMs) break
      this.entries.delete(key)
      removed++
    }
    return removed
  }

  get size(): number {
    return this.entries.size
  }
}
