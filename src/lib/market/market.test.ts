import { describe, it, expect } from 'vitest'
import { createRandom, generateBars, generateLinearBars } from './bar-generator'
import { SyntheticMarketDataSource } from './synthetic-source'
import { timeframeToMs } from './types'
import { ErrorCode, TradingError } from '../errors'

const START = Date.UTC(2024, 0, 1)

describe('timeframeToMs', () => {
  it('should read second, minute, hour and day labels', () => {
    expect(timeframeToMs('30s')).toBe(30_000)
    expect(timeframeToMs('5m')).toBe(300_000)
    expect(timeframeToMs('4h')).toBe(14_400_000)
    expect(timeframeToMs('1d')).toBe(86_400_000)
  })

  it('should return null for labels it cannot read', () => {
    expect(timeframeToMs('1w')).toBeNull()
    expect(timeframeToMs('0m')).toBeNull()
    expect(timeframeToMs('m5')).toBeNull()
  })
})

describe('bar generator', () => {
  it('should repeat for the same seed', () => {
    const a = createRandom(9)
    const b = createRandom(9)
    expect([a(), a(), a()]).toEqual([b(), b(), b()])
    expect(generateBars({ count: 20, seed: 3 })).toEqual(generateBars({ count: 20, seed: 3 }))
  })

  it('should keep high and low around open and close', () => {
    for (const bar of generateBars({ count: 50 })) {
      expect(bar.high).toBeGreaterThanOrEqual(Math.max(bar.open, bar.close))
      expect(bar.low).toBeLessThanOrEqual(Math.min(bar.open, bar.close))
    }
  })

  it('should step linear bars by a fixed amount', () => {
    const bars = generateLinearBars(3, { start: 10, step: 2, spread: 1 })
    expect(bars.map((b) => b.close)).toEqual([10, 12, 14])
    expect(bars[1]).toEqual({ timestamp: START + 60_000, open: 10, high: 13, low: 11, close: 12, volume: 1000 })
  })
})

describe('SyntheticMarketDataSource', () => {
  it('should serve the latest bars up to the cursor', async () => {
    const source = new SyntheticMarketDataSource({}, 120)
    const bars = await source.fetchBars('BTCUSDT', '1m', 50)

    expect(bars).toHaveLength(50)
    expect(bars[49].timestamp).toBe(START + 119 * 60_000)
    expect(source.lastPrice('BTCUSDT', '1m')).toBe(bars[49].close)
  })

  it('should move one bar forward on advance', async () => {
    const source = new SyntheticMarketDataSource({}, 120)
    const before = await source.fetchBars('BTCUSDT', '1m', 5)
    source.advance()
    const after = await source.fetchBars('BTCUSDT', '1m', 5)

    expect(after[4].timestamp - before[4].timestamp).toBe(60_000)
    expect(after[3]).toEqual(before[4])
  })

  it('should give each symbol its own series', async () => {
    const source = new SyntheticMarketDataSource()
    const btc = await source.fetchBars('BTCUSDT', '1m', 3)
    const eth = await source.fetchBars('ETHUSDT', '1m', 3)
    expect(btc[2].close).not.toBe(eth[2].close)
  })

  it('should have no price for a series it never served', () => {
    expect(new SyntheticMarketDataSource().lastPrice('BTCUSDT', '1m')).toBeNull()
  })

  it('should reject an unsupported timeframe', async () => {
    const source = new SyntheticMarketDataSource()
    const error = await source.fetchBars('BTCUSDT', '1w', 5).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(TradingError)
    expect(error instanceof TradingError && error.code).toBe(ErrorCode.MARKET_DATA_UNAVAILABLE)
  })
})
