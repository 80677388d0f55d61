// ============================================================
// Position Book & Size Limits
// ============================================================
// Net position per symbol (filled orders plus orders already handed to
// the broker), last known mark prices and account equity. The limit
// check projects the book forward by one order.
// ============================================================

import type { GateResult, OrderRequest, OrderSide } from './types'

export interface PositionLimits {
  /** largest single order */
  maxOrderQuantity: number
  /** absolute net quantity per symbol */
  maxPositionQuantity: number
  /** absolute net notional per symbol */
  maxPositionNotional: number
  /** sum of absolute notional over all symbols */
  maxAccountExposure: number
  /** account exposure / equity */
  maxLeverage: number
}

export const DEFAULT_POSITION_LIMITS: PositionLimits = {
  maxOrderQuantity: 1000,
  maxPositionQuantity: 1000,
  maxPositionNotional: 100_000,
  maxAccountExposure: 250_000,
  maxLeverage: 5,
}

export interface PositionSnapshot {
  symbol: string
  /** signed; long > 0 */
  quantity: number
  reserved: number
  markPrice: number | null
}

export interface FillApplication {
  opened: boolean
  closed: boolean
  quantity: number
}

function signed(side: OrderSide, quantity: number): number {
  return side === 'buy' ? quantity : -quantity
}

export class PositionBook {
  private positions: Map<string, number> = new Map()
  private reservations: Map<string, { symbol: string; quantity: number }> = new Map()
  private marks: Map<string, number> = new Map()
  private equity: number

  constructor(initialEquity: number) {
    this.equity = initialEquity
  }

  getQuantity(symbol: string): number {
    return this.positions.get(symbol) ?? 0
  }

  /** filled plus reserved */
  getProjectedQuantity(symbol: string): number {
    let total = this.getQuantity(symbol)
    for (const r of this.reservations.values()) {
      if (r.symbol === symbol) total += r.quantity
    }
    return total
  }

  /** Hold room for an order that is on its way to the broker */
  reserve(orderId: string, order: Pick<OrderRequest, 'symbol' | 'side' | 'quantity'>): void {
    this.reservations.set(orderId, { symbol: order.symbol, quantity: signed(order.side, order.quantity) })
  }

  release(orderId: string): boolean {
    return this.reservations.delete(orderId)
  }

  /**
   * Move a reservation into the filled position
   */
  applyFill(orderId: string, order: Pick<OrderRequest, 'symbol' | 'side' | 'quantity'>, price?: number): FillApplication {
    this.reservations.delete(orderId)
    const before = this.getQuantity(order.symbol)
    const after = before + signed(order.side, order.quantity)

    if (after === 0) this.positions.delete(order.symbol)
    else this.positions.set(order.symbol, after)
    if (price !== undefined) this.marks.set(order.symbol, price)

    return { opened: before === 0 && after !== 0, closed: before !== 0 && after === 0, quantity: after }
  }

  /**
   * Reduce a position closed outside the pipeline (stop, manual exit)
   */
  reduce(symbol: string, quantity: number): FillApplication {
    const before = this.getQuantity(symbol)
    if (before === 0) return { opened: false, closed: false, quantity: 0 }

    const size = Math.min(Math.abs(before), Math.abs(quantity))
    const after = before > 0 ? before - size : before + size
    if (after === 0) this.positions.delete(symbol)
    else this.positions.set(symbol, after)

    return { opened: false, closed: after === 0, quantity: after }
  }

  setMarkPrice(symbol: string, price: number): void {
    this.marks.set(symbol, price)
  }

  getMarkPrice(symbol: string): number | null {
    return this.marks.get(symbol) ?? null
  }

  setEquity(equity: number): void {
    this.equity = equity
  }

  getEquity(): number {
    return this.equity
  }

  /** Symbols with a filled or reserved position */
  symbols(): string[] {
    const out = new Set(this.positions.keys())
    for (const r of this.reservations.values()) out.add(r.symbol)
    return [...out]
  }

  get reservedCount(): number {
    return this.reservations.size
  }

  snapshot(): PositionSnapshot[] {
    return this.symbols().map((symbol) => ({
      symbol,
      quantity: this.getQuantity(symbol),
      reserved: this.getProjectedQuantity(symbol) - this.getQuantity(symbol),
      markPrice: this.getMarkPrice(symbol),
    }))
  }
}

/**
 * Would the book still be within limits after `order`?
 * Notional checks need a price (the order's own, else the mark) and are
 * skipped for symbols with none.
 */
export function checkPositionLimits(
  order: OrderRequest,
  book: PositionBook,
  limits: PositionLimits,
): GateResult {
  const gate = 'position_limits' as const

  if (order.quantity > limits.maxOrderQuantity) {
    return {
      allowed: false,
      gate,
      reason: 'LimitExceeded',
      message: `Order quantity ${order.quantity} exceeds max order quantity ${limits.maxOrderQuantity}`,
    }
  }

  const projected = book.getProjectedQuantity(order.symbol) + signed(order.side, order.quantity)
  if (Math.abs(projected) > limits.maxPositionQuantity) {
    return {
      allowed: false,
      gate,
      reason: 'LimitExceeded',
      message: `${order.symbol} position ${Math.abs(projected)} would exceed ${limits.maxPositionQuantity}`,
    }
  }

  const price = order.price ?? book.getMarkPrice(order.symbol)
  if (price !== null) {
    const notional = Math.abs(projected) * price
    if (notional > limits.maxPositionNotional) {
      return {
        allowed: false,
        gate,
        reason: 'LimitExceeded',
        message: `${order.symbol} notional ${notional} would exceed ${limits.maxPositionNotional}`,
      }
    }
  }

  let exposure = 0
  for (const symbol of book.symbols()) {
    if (symbol === order.symbol) continue
    const mark = book.getMarkPrice(symbol)
    if (mark !== null) exposure += Math.abs(book.getProjectedQuantity(symbol)) * mark
  }
  if (price !== null) exposure += Math.abs(projected) * price

  if (exposure > limits.maxAccountExposure) {
    return {
      allowed: false,
      gate,
      reason: 'LimitExceeded',
      message: `Account exposure ${exposure} would exceed ${limits.maxAccountExposure}`,
    }
  }

  const equity = book.getEquity()
  if (equity > 0 && exposure / equity > limits.maxLeverage) {
    return {
      allowed: false,
      gate,
      reason: 'LimitExceeded',
      message: `Leverage ${(exposure / equity).toFixed(2)}x would exceed ${limits.maxLeverage}x`,
    }
  }
  if (equity <= 0 && exposure > 0) {
    return { allowed: false, gate, reason: 'LimitExceeded', message: 'No equity to carry exposure' }
  }

  return { allowed: true, gate }
}
