import { generateBars } from './bar-generator'
import type { BarGeneratorConfig } from './bar-generator'
import { timeframeToMs } from './types'
import type { IMarketDataSource, Timeframe } from './types'
import type { Bar } from '../indicators/types'
import { ErrorCode, TradingError } from '../errors'

/**
 * Serves bars from a seeded random walk, advancing one bar per `advance()`.
 * Each (symbol, timeframe) pair gets its own series.
 */
export class SyntheticMarketDataSource implements IMarketDataSource {
  readonly name = 'synthetic'
  private series: Map<string, Bar[]> = new Map()
  private cursor: Map<string, number> = new Map()

  constructor(
    private readonly config: Partial<BarGeneratorConfig> = {},
    private readonly history: number = 120,
  ) {}

  private ensure(symbol: string, timeframe: Timeframe): string {
    const key = `${symbol}:${timeframe}`
    if (!this.series.has(key)) {
      const intervalMs = timeframeToMs(timeframe)
      if (intervalMs === null) {
        throw new TradingError({
          code: ErrorCode.MARKET_DATA_UNAVAILABLE,
          message: `Unsupported timeframe: ${timeframe}`,
          context: { module: 'lib/market', function: 'fetchBars' },
        })
      }
      let seed = this.config.seed ?? 42
      for (const ch of key) seed = (seed * 31 + ch.charCodeAt(0)) % 2147483647
      this.series.set(key, generateBars({ count: 5000, ...this.config, intervalMs, seed }))
      this.cursor.set(key, this.history)
    }
    return key
  }

  /** Moves every known series one bar forward */
  advance(): void {
    for (const [key, position] of this.cursor) {
      const total = this.series.get(key)?.length ?? 0
      this.cursor.set(key, Math.min(position + 1, total))
    }
  }

  async fetchBars(symbol: string, timeframe: Timeframe, limit: number): Promise<Bar[]> {
    const key = this.ensure(symbol, timeframe)
    const bars = this.series.get(key) ?? []
    const end = this.cursor.get(key) ?? 0
    return bars.slice(Math.max(0, end - limit), end)
  }

  /** Close of the latest served bar */
  lastPrice(symbol: string, timeframe: Timeframe): number | null {
    const key = `${symbol}:${timeframe}`
    const bars = this.series.get(key)
    const end = this.cursor.get(key)
    if (!bars || end === undefined || end === 0) return null
    return bars[end - 1].close
  }
}
