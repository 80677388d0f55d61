// ============================================================
// Order Builder
// ============================================================
// Turns an actionable signal into an OrderRequest. A flat signal has no
// order; that is the only way a signal is kept away from the pipeline.
// Exit orders flatten a held position at market.
// ============================================================

import type { OrderRequest, OrderType } from '../trading/types'
import { assertValidQuantity } from '../trading/validate-order'
import type { TradeSignal } from './types'

export interface SizingConfig {
  /** quantity at full strength, or always when scaleByStrength is off */
  baseQuantity: number
  /** multiply baseQuantity by signal strength (default false) */
  scaleByStrength?: boolean
  /** round down to a multiple of this lot size */
  quantityStep?: number
  orderType?: OrderType
  /** required for limit orders; market orders may carry a reference price */
  limitPrice?: number
}

/**
 * OrderRequest for `signal`, or null when the signal is flat or the
 * scaled size rounds down to nothing
 */
export function buildOrderRequest(signal: TradeSignal, sizing: SizingConfig): OrderRequest | null {
  if (signal.direction === 'flat') return null

  const context = { module: 'lib/signals', function: 'buildOrderRequest' } as const
  const base = assertValidQuantity(sizing.baseQuantity, context)

  let quantity = sizing.scaleByStrength ? base * signal.strength : base
  if (sizing.quantityStep !== undefined && sizing.quantityStep > 0) {
    // epsilon for float noise, e.g. 0.3 / 0.1
    const lots = Math.floor(quantity / sizing.quantityStep + 1e-9)
    quantity = Number((lots * sizing.quantityStep).toFixed(10))
  }
  if (quantity <= 0) return null

  const order: OrderRequest = {
    symbol: signal.symbol,
    side: signal.direction === 'long' ? 'buy' : 'sell',
    quantity: assertValidQuantity(quantity, context),
    orderType: sizing.orderType ?? 'market',
  }
  if (sizing.limitPrice !== undefined) order.price = sizing.limitPrice

  return order
}

/**
 * Market order flattening a signed position, or null when flat
 */
export function buildExitOrder(symbol: string, position: number): OrderRequest | null {
  if (position === 0) return null
  return {
    symbol,
    side: position > 0 ? 'sell' : 'buy',
    quantity: assertValidQuantity(Math.abs(position), { module: 'lib/signals', function: 'buildExitOrder' }),
    orderType: 'market',
  }
}
