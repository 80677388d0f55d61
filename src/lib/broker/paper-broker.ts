// ============================================================
// Paper Broker
// ============================================================
// In-process venue for dry runs: market orders fill at the last mark
// price, limit orders at their own price. Nothing rests on a book.
// ============================================================

import { loggers } from '../logger'
import type { BrokerAdapter, BrokerOrder, BrokerOrderResult } from './types'

const logger = loggers.broker

export interface PaperBrokerOptions {
  /** artificial latency per order (ms) */
  latencyMs?: number
  /** fraction of the price added against the trader, e.g. 0.0005 */
  slippage?: number
  /** price lookup used for symbols without a mark */
  quote?: (symbol: string) => number | null
}

export interface PaperFill {
  clientOrderId: string
  brokerOrderId: string
  symbol: string
  side: BrokerOrder['side']
  quantity: number
  price: number
}

export class PaperBroker implements BrokerAdapter {
  readonly name = 'paper'
  private marks: Map<string, number> = new Map()
  private fills: PaperFill[] = []
  private cancelled: Set<string> = new Set()
  private sequence = 0

  constructor(private readonly options: PaperBrokerOptions = {}) {}

  setMarkPrice(symbol: string, price: number): void {
    this.marks.set(symbol, price)
  }

  async placeOrder(order: BrokerOrder): Promise<BrokerOrderResult> {
    if (this.options.latencyMs) {
      await new Promise((resolve) => setTimeout(resolve, this.options.latencyMs))
    }

    if (this.cancelled.has(order.clientOrderId)) {
      return { status: 'rejected', message: `Order ${order.clientOrderId} was cancelled` }
    }

    const base = order.orderType === 'limit' ? order.price : this.markFor(order.symbol)
    if (base === undefined || base === null) {
      logger.warn(`No price for ${order.symbol}, rejecting ${order.clientOrderId}`)
      return { status: 'rejected', message: `No price for ${order.symbol}` }
    }

    const slip = order.orderType === 'market' ? (this.options.slippage ?? 0) : 0
    const price = order.side === 'buy' ? base * (1 + slip) : base * (1 - slip)
    const brokerOrderId = `paper-${++this.sequence}`

    this.fills.push({
      clientOrderId: order.clientOrderId,
      brokerOrderId,
      symbol: order.symbol,
      side: order.side,
      quantity: order.quantity,
      price,
    })
    logger.debug(`Paper fill ${order.side} ${order.quantity} ${order.symbol} @ ${price}`)

    return { status: 'filled', fillPrice: price, brokerOrderId }
  }

  private markFor(symbol: string): number | null {
    return this.marks.get(symbol) ?? this.options.quote?.(symbol) ?? null
  }

  /** Marks the order so a fill that has not happened yet is refused */
  async cancelOrder(clientOrderId: string): Promise<void> {
    this.cancelled.add(clientOrderId)
  }

  getFills(): PaperFill[] {
    return [...this.fills]
  }
}
