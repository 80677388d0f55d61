// ============================================================
// Approval Queue
// ============================================================
// Orders parked at the manual-approval gate, oldest first. Expiry is
// checked by the caller; nothing here runs on a timer.
// ============================================================

export const DEFAULT_APPROVAL_TIMEOUT_MS = 5 * 60 * 1000

export interface PendingApproval {
  orderId: string
  symbol: string
  enqueuedAt: number
}

export class ApprovalQueue {
  private pending: Map<string, PendingApproval> = new Map()

  constructor(private readonly timeoutMs: number = DEFAULT_APPROVAL_TIMEOUT_MS) {}

  add(orderId: string, symbol: string, now: number): void {
    this.pending.set(orderId, { orderId, symbol, enqueuedAt: now })
  }

  remove(orderId: string): boolean {
    return this.pending.delete(orderId)
  }

  /**
   * Remove and return every entry older than the timeout
   */
  takeExpired(now: number): PendingApproval[] {
    const expired: PendingApproval[] = []
    for (const entry of this.pending.values()) {
      if (now - entry.enqueuedAt < this.timeoutMs) break
      expired.push(entry)
    }
    for (const entry of expired) this.pending.delete(entry.orderId)
    return expired
  }

  /** Remove and return everything */
  drain(): PendingApproval[] {
    const all = [...this.pending.values()]
    this.pending.clear()
    return all
  }

  list(): PendingApproval[] {
    return [...this.pending.values()]
  }

  get size(): number {
    return this.pending.size
  }
}
