import { describe, it, expect, beforeEach } from 'vitest'
import { DEFAULT_POSITION_LIMITS, PositionBook, checkPositionLimits } from './position-limits'
import type { PositionLimits } from './position-limits'
import type { OrderRequest } from './types'

const limits: PositionLimits = {
  maxOrderQuantity: 10,
  maxPositionQuantity: 15,
  maxPositionNotional: 1_500,
  maxAccountExposure: 2_500,
  maxLeverage: 2,
}

function buy(quantity: number, symbol = 'BTCUSDT'): OrderRequest {
  return { symbol, side: 'buy', quantity, orderType: 'market' }
}

describe('PositionBook', () => {
  let book: PositionBook

  beforeEach(() => {
    book = new PositionBook(2_000)
  })

  it('should project reservations on top of fills', () => {
    book.applyFill('ord-1', buy(3))
    book.reserve('ord-2', buy(2))
    book.reserve('ord-3', { symbol: 'BTCUSDT', side: 'sell', quantity: 1 })

    expect(book.getQuantity('BTCUSDT')).toBe(3)
    expect(book.getProjectedQuantity('BTCUSDT')).toBe(4)
    expect(book.snapshot()).toEqual([{ symbol: 'BTCUSDT', quantity: 3, reserved: 1, markPrice: null }])
  })

  it('should report when a fill opens and closes a position', () => {
    book.reserve('ord-1', buy(2))
    expect(book.applyFill('ord-1', buy(2), 100)).toEqual({ opened: true, closed: false, quantity: 2 })
    expect(book.reservedCount).toBe(0)
    expect(book.getMarkPrice('BTCUSDT')).toBe(100)

    expect(book.applyFill('ord-2', { symbol: 'BTCUSDT', side: 'sell', quantity: 2 })).toEqual({
      opened: false,
      closed: true,
      quantity: 0,
    })
    expect(book.symbols()).toEqual([])
  })

  it('should reduce toward zero without flipping', () => {
    book.applyFill('ord-1', { symbol: 'ETHUSDT', side: 'sell', quantity: 4 })
    expect(book.reduce('ETHUSDT', 10)).toEqual({ opened: false, closed: true, quantity: 0 })
    expect(book.reduce('ETHUSDT', 1)).toEqual({ opened: false, closed: false, quantity: 0 })
  })
})

describe('checkPositionLimits', () => {
  let book: PositionBook

  beforeEach(() => {
    book = new PositionBook(2_000)
    book.setMarkPrice('BTCUSDT', 100)
  })

  it('should allow an order within every limit', () => {
    expect(checkPositionLimits(buy(5), book, limits)).toEqual({ allowed: true, gate: 'position_limits' })
  })

  it('should reject an oversized order', () => {
    expect(checkPositionLimits(buy(11), book, limits)).toEqual({
      allowed: false,
      gate: 'position_limits',
      reason: 'LimitExceeded',
      message: 'Order quantity 11 exceeds max order quantity 10',
    })
  })

  it('should count reservations toward the position size', () => {
    book.reserve('ord-1', buy(8))
    expect(checkPositionLimits(buy(8), book, limits).message).toBe('BTCUSDT position 16 would exceed 15')
  })

  it('should check notional at the mark price', () => {
    book.setMarkPrice('BTCUSDT', 200)
    expect(checkPositionLimits(buy(8), book, limits).message).toBe('BTCUSDT notional 1600 would exceed 1500')
  })

  it('should use the order price over the mark', () => {
    const order: OrderRequest = { ...buy(5), orderType: 'limit', price: 400 }
    expect(checkPositionLimits(order, book, limits).message).toBe('BTCUSDT notional 2000 would exceed 1500')
  })

  it('should skip notional checks for a symbol without a price', () => {
    expect(checkPositionLimits(buy(10, 'XYZUSD'), book, limits).allowed).toBe(true)
  })

  it('should add other symbols to the account exposure', () => {
    book.setMarkPrice('ETHUSDT', 200)
    book.applyFill('ord-1', buy(10, 'ETHUSDT'))
    expect(checkPositionLimits(buy(6), book, limits).message).toBe('Account exposure 2600 would exceed 2500')
  })

  it('should cap leverage against equity', () => {
    book.setEquity(400)
    expect(checkPositionLimits(buy(10), book, limits).message).toBe('Leverage 2.50x would exceed 2x')
  })

  it('should reject exposure without equity', () => {
    book.setEquity(0)
    expect(checkPositionLimits(buy(1), book, limits).message).toBe('No equity to carry exposure')
  })

  it('should default to generous limits', () => {
    expect(checkPositionLimits(buy(1), book, DEFAULT_POSITION_LIMITS).allowed).toBe(true)
  })
})
