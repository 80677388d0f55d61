import { describe, it, expect } from 'vitest'
import { PaperBroker } from './paper-broker'
import type { BrokerOrder } from './types'

const order: BrokerOrder = {
  clientOrderId: 'ord-1',
  symbol: 'BTCUSDT',
  side: 'buy',
  quantity: 2,
  orderType: 'market',
}

describe('PaperBroker', () => {
  it('should fill a market order at the mark price', async () => {
    const broker = new PaperBroker()
    broker.setMarkPrice('BTCUSDT', 200)

    expect(await broker.placeOrder(order)).toEqual({ status: 'filled', fillPrice: 200, brokerOrderId: 'paper-1' })
    expect(broker.getFills()).toEqual([
      { clientOrderId: 'ord-1', brokerOrderId: 'paper-1', symbol: 'BTCUSDT', side: 'buy', quantity: 2, price: 200 },
    ])
  })

  it('should apply slippage against the trader on market orders only', async () => {
    const broker = new PaperBroker({ slippage: 0.5 })
    broker.setMarkPrice('BTCUSDT', 200)

    expect((await broker.placeOrder(order)).fillPrice).toBe(300)
    expect((await broker.placeOrder({ ...order, clientOrderId: 'ord-2', side: 'sell' })).fillPrice).toBe(100)
    expect(
      (await broker.placeOrder({ ...order, clientOrderId: 'ord-3', orderType: 'limit', price: 150 })).fillPrice,
    ).toBe(150)
  })

  it('should fall back to the quote function', async () => {
    const broker = new PaperBroker({ quote: (symbol) => (symbol === 'BTCUSDT' ? 120 : null) })
    expect((await broker.placeOrder(order)).fillPrice).toBe(120)
    expect(await broker.placeOrder({ ...order, symbol: 'ETHUSDT' })).toEqual({
      status: 'rejected',
      message: 'No price for ETHUSDT',
    })
  })

  it('should prefer the mark over the quote', async () => {
    const broker = new PaperBroker({ quote: () => 120 })
    broker.setMarkPrice('BTCUSDT', 110)
    expect((await broker.placeOrder(order)).fillPrice).toBe(110)
  })

  it('should refuse an order cancelled before it filled', async () => {
    const broker = new PaperBroker()
    broker.setMarkPrice('BTCUSDT', 200)
    await broker.cancelOrder('ord-1')

    expect(await broker.placeOrder(order)).toEqual({ status: 'rejected', message: 'Order ord-1 was cancelled' })
    expect(broker.getFills()).toEqual([])
  })
})
