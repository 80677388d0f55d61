import { describe, it, expect, vi } from 'vitest'
import { fileURLToPath } from 'url'
import { AnalysisCycle } from './analysis-cycle'
import type { CycleResult } from './analysis-cycle'
import { loadStrategyDocument } from '../config/strategy-document'
import type { StrategyDocument } from '../config/strategy-document'
import { PaperBroker } from '../broker/paper-broker'
import type { BrokerAdapter, BrokerOrderResult } from '../broker/types'
import { ErrorCode, TradingError } from '../errors'
import { IndicatorEngine } from '../indicators/engine'
import type { Bar } from '../indicators/types'
import { generateBars, generateLinearBars } from '../market/bar-generator'
import type { IMarketDataSource, Timeframe } from '../market/types'
import { cond, ref } from '../regime/builders'
import { ExecutionPipeline } from '../trading/execution-pipeline'
import { RiskManager } from '../trading/risk-manager'

const DEFAULT_DOCUMENT = fileURLToPath(new URL('../../../config/strategies/default.json', import.meta.url))

const document: StrategyDocument = {
  schemaVersion: 1,
  indicators: [
    { id: 'px', type: 'price' },
    { id: 'sma5', type: 'sma', params: { period: 5 } },
    { id: 'sma10', type: 'sma', params: { period: 10 } },
  ],
  regimes: [{ id: 'rising', scope: 'entry', conditions: cond.gt(ref('sma5'), ref('sma10')) }],
  strategies: [
    {
      id: 'follow_long',
      regimeIds: ['rising'],
      direction: 'long',
      entry: cond.gt(ref('px', 'close'), ref('sma5')),
    },
  ],
}

const exitDocument: StrategyDocument = {
  ...document,
  regimes: [
    ...document.regimes,
    { id: 'falling', scope: 'exit', conditions: cond.lt(ref('sma5'), ref('sma10')) },
  ],
}

/** Strictly rising one-minute closes, 1% per bar */
function risingBars(count: number): Bar[] {
  const start = Date.UTC(2024, 0, 1)
  const bars: Bar[] = []
  for (let i = 0; i < count; i++) {
    const close = 100 * 1.01 ** i
    const open = i === 0 ? close : bars[i - 1].close
    bars.push({ timestamp: start + i * 60_000, open, high: close * 1.001, low: open * 0.999, close, volume: 1000 })
  }
  return bars
}

class FixedSource implements IMarketDataSource {
  readonly name = 'fixed'
  readonly requests: number[] = []

  constructor(readonly bars: Bar[]) {}

  async fetchBars(_symbol: string, _timeframe: Timeframe, limit: number): Promise<Bar[]> {
    this.requests.push(limit)
    return this.bars.slice(-limit)
  }
}

function tradingCycle(strategy: StrategyDocument = document): { cycle: AnalysisCycle; pipeline: ExecutionPipeline } {
  const broker = new PaperBroker()
  broker.setMarkPrice('BTCUSDT', 129)
  const pipeline = new ExecutionPipeline({ broker, risk: new RiskManager() }, { requireApproval: false })
  const cycle = new AnalysisCycle({
    symbol: 'BTCUSDT',
    timeframe: '1m',
    document: strategy,
    pipeline,
    sizing: { baseQuantity: 1 },
  })
  return { cycle, pipeline }
}

describe('AnalysisCycle', () => {
  describe('runOnce', () => {
    it('should wait for enough bars', async () => {
      const cycle = new AnalysisCycle({ symbol: 'BTCUSDT', timeframe: '1m', document })
      cycle.setHistory(generateLinearBars(5))

      const result = await cycle.runOnce()
      expect(cycle.getRequiredBars()).toBe(10)
      expect(result.status).toBe('insufficient_data')
      expect(result.barCount).toBe(5)
      expect(result.signal).toBeNull()
    })

    it('should run bars through to a filled order', async () => {
      const { cycle, pipeline } = tradingCycle()
      const seen: CycleResult[] = []
      cycle.onResult((r) => seen.push(r))
      cycle.setHistory(generateLinearBars(30))

      const result = await cycle.runOnce()

      expect(result.status).toBe('ok')
      expect(result.snapshot.sma5.value).toBeCloseTo(127)
      expect(result.snapshot.sma10.value).toBeCloseTo(124.5)
      expect(result.activeRegimes).toEqual(['rising'])
      expect(result.signal).toMatchObject({
        symbol: 'BTCUSDT',
        direction: 'long',
        strategyId: 'follow_long',
        regimeIds: ['rising'],
      })
      expect(result.order).toEqual({ symbol: 'BTCUSDT', side: 'buy', quantity: 1, orderType: 'market' })
      expect(result.submission).toEqual({ status: 'filled', orderId: 'ord-1', fillPrice: 129, brokerOrderId: 'paper-1' })
      expect(pipeline.getStatus().positions[0]).toMatchObject({ symbol: 'BTCUSDT', quantity: 1 })
      expect(seen).toEqual([result])
      expect(cycle.getLastResult()).toBe(result)
    })

    it('should stay flat and send nothing when no regime is active', async () => {
      const { cycle } = tradingCycle()
      cycle.setHistory(generateLinearBars(30, { start: 200, step: -1 }))

      const result = await cycle.runOnce()
      expect(result.activeRegimes).toEqual([])
      expect(result.signal?.reason).toBe('no_active_regime')
      expect(result.order).toBeNull()
      expect(result.submission).toBeUndefined()
    })

    it('should only produce signals without a pipeline', async () => {
      const cycle = new AnalysisCycle({ symbol: 'BTCUSDT', timeframe: '1m', document })
      cycle.setHistory(generateLinearBars(30))

      const result = await cycle.runOnce()
      expect(result.signal?.direction).toBe('long')
      expect(result.order).toBeNull()
    })

    it('should wait for whole buckets of a coarser indicator', () => {
      const coarse: StrategyDocument = {
        ...document,
        indicators: [...document.indicators, { id: 'sma3_5m', type: 'sma', params: { period: 3 }, timeframe: '5m' }],
      }
      const cycle = new AnalysisCycle({ symbol: 'BTCUSDT', timeframe: '1m', document: coarse })
      expect(cycle.getRequiredBars()).toBe(15)
    })

    it('should run the bundled strategy document without indicator failures', async () => {
      const loaded = await loadStrategyDocument(DEFAULT_DOCUMENT)
      if (!loaded.success) throw loaded.error
      const cycle = new AnalysisCycle({ symbol: 'ETHUSDT', timeframe: '1m', document: loaded.data })
      cycle.setHistory(generateBars({ count: 120, trend: 0.001, seed: 7 }))

      const result = await cycle.runOnce()
      expect(result.status).toBe('ok')
      expect(result.failures).toEqual([])
      expect(Object.keys(result.snapshot).sort()).toEqual(['adx14', 'bb20', 'ema20', 'ema50', 'macd', 'px', 'rsi14'])
    })

    it('should trade the bundled strategy on a steady uptrend', async () => {
      const loaded = await loadStrategyDocument(DEFAULT_DOCUMENT)
      if (!loaded.success) throw loaded.error
      const bars = risingBars(100)

      const adx = new IndicatorEngine().calculate(bars, { indicatorType: 'adx', params: { period: 14 } })
      for (const value of adx.fields.value.slice(-20)) {
        expect(value).toBeGreaterThan(25)
      }

      const placeOrder = vi.fn(
        async (): Promise<BrokerOrderResult> => ({ status: 'filled', fillPrice: 268, brokerOrderId: 'stub-1' }),
      )
      const broker: BrokerAdapter = { name: 'stub', placeOrder }
      const pipeline = new ExecutionPipeline({ broker, risk: new RiskManager() }, { requireApproval: false })
      const cycle = new AnalysisCycle({
        symbol: 'BTCUSDT',
        timeframe: '1m',
        document: loaded.data,
        pipeline,
        sizing: { baseQuantity: 1 },
      })
      cycle.setHistory(bars)

      const result = await cycle.runOnce()

      expect(result.activeRegimes).toEqual(['trend_up'])
      expect(result.signal?.direction).toBe('long')
      expect(result.signal?.strategyId).toBe('trend_pullback_long')
      // macd agrees (weight 2), rsi sits at 100 and does not
      expect(result.signal?.confluenceScore).toBeCloseTo(2 / 3)
      expect(placeOrder).toHaveBeenCalledTimes(1)
      expect(placeOrder).toHaveBeenCalledWith({
        symbol: 'BTCUSDT',
        side: 'buy',
        quantity: 1,
        orderType: 'market',
        clientOrderId: 'ord-1',
      })
      expect(result.submission).toEqual({ status: 'filled', orderId: 'ord-1', fillPrice: 268, brokerOrderId: 'stub-1' })
    })

    it('should not evaluate exit regimes while flat', async () => {
      const { cycle } = tradingCycle(exitDocument)
      cycle.setHistory(generateLinearBars(30, { start: 200, step: -1 }))

      const result = await cycle.runOnce()
      expect(result.activeExitRegimes).toEqual([])
      expect(result.order).toBeNull()
    })

    it('should close a held position when an exit regime turns active', async () => {
      const { cycle, pipeline } = tradingCycle(exitDocument)
      cycle.setHistory(generateLinearBars(30))
      const entry = await cycle.runOnce()
      expect(entry.activeExitRegimes).toEqual([])
      expect(pipeline.getPositionQuantity('BTCUSDT')).toBe(1)

      cycle.setHistory(generateLinearBars(30, { start: 200, step: -1 }))
      const exit = await cycle.runOnce()

      expect(exit.activeRegimes).toEqual([])
      expect(exit.activeExitRegimes).toEqual(['falling'])
      expect(exit.order).toEqual({ symbol: 'BTCUSDT', side: 'sell', quantity: 1, orderType: 'market' })
      expect(exit.submission).toMatchObject({ status: 'filled', orderId: 'ord-2' })
      expect(pipeline.getPositionQuantity('BTCUSDT')).toBe(0)
    })

    it('should keep the position while no exit regime is active', async () => {
      const { cycle, pipeline } = tradingCycle(exitDocument)
      cycle.setHistory(generateLinearBars(30))
      await cycle.runOnce()

      cycle.setHistory(generateLinearBars(30, { start: 101 }))
      const held = await cycle.runOnce()

      expect(held.activeExitRegimes).toEqual([])
      expect(held.order).toEqual({ symbol: 'BTCUSDT', side: 'buy', quantity: 1, orderType: 'market' })
      expect(pipeline.getPositionQuantity('BTCUSDT')).toBeGreaterThan(0)
    })

    it('should keep publishing when a listener throws', async () => {
      const cycle = new AnalysisCycle({ symbol: 'BTCUSDT', timeframe: '1m', document })
      const second = vi.fn()
      cycle.onResult(() => {
        throw new Error('listener failed')
      })
      cycle.onResult(second)

      await cycle.runOnce()
      expect(second).toHaveBeenCalledTimes(1)
    })

    it('should stop notifying after unsubscribe', async () => {
      const cycle = new AnalysisCycle({ symbol: 'BTCUSDT', timeframe: '1m', document })
      const listener = vi.fn()
      const unsubscribe = cycle.onResult(listener)
      unsubscribe()

      await cycle.runOnce()
      expect(listener).not.toHaveBeenCalled()
    })
  })

  describe('bar buffer', () => {
    it('should sort, dedupe and cap the history', () => {
      const cycle = new AnalysisCycle({ symbol: 'BTCUSDT', timeframe: '1m', document, maxBars: 12 })
      const bars = generateLinearBars(30)
      cycle.setHistory([...bars].reverse().concat(bars.slice(0, 3)))

      const kept = cycle.getBars()
      expect(kept).toHaveLength(12)
      expect(kept[0].timestamp).toBe(bars[18].timestamp)
      expect(kept[11].timestamp).toBe(bars[29].timestamp)
    })

    it('should only append newer bars and drop the oldest past maxBars', () => {
      const cycle = new AnalysisCycle({ symbol: 'BTCUSDT', timeframe: '1m', document, maxBars: 3 })
      const bars = generateLinearBars(5)
      cycle.setHistory(bars.slice(0, 3))

      expect(cycle.addBar(bars[1])).toBe(false)
      expect(cycle.addBar(bars[2])).toBe(false)
      expect(cycle.addBar(bars[3])).toBe(true)
      expect(cycle.getBars().map((b) => b.close)).toEqual([101, 102, 103])
    })
  })

  describe('polling', () => {
    it('should load history first and then the latest bars', async () => {
      const source = new FixedSource(generateLinearBars(30))
      const cycle = new AnalysisCycle({ symbol: 'BTCUSDT', timeframe: '1m', document, source, historyBars: 20 })

      await cycle.tick()
      expect(source.requests).toEqual([20])
      expect(cycle.getBars()).toHaveLength(20)
      expect(cycle.getLastResult()?.status).toBe('ok')

      source.bars.push(...generateLinearBars(31).slice(30))
      await cycle.tick()
      expect(source.requests).toEqual([20, 5])
      expect(cycle.getBars()).toHaveLength(21)
    })

    it('should skip a tick while the previous one runs', async () => {
      const source = new FixedSource(generateLinearBars(30))
      const cycle = new AnalysisCycle({ symbol: 'BTCUSDT', timeframe: '1m', document, source })

      const first = cycle.tick()
      const second = cycle.tick()
      expect(second).toBe(first)
      expect(cycle.skipped).toBe(1)

      await first
      expect(source.requests).toEqual([200])
    })

    it('should not reject when the source fails', async () => {
      const source: IMarketDataSource = {
        name: 'down',
        fetchBars: () => Promise.reject(new Error('feed down')),
      }
      const cycle = new AnalysisCycle({ symbol: 'BTCUSDT', timeframe: '1m', document, source })

      await expect(cycle.tick()).resolves.toBeUndefined()
      expect(cycle.getLastResult()).toBeNull()
    })

    it('should run a tick on start and finish it on stop', async () => {
      const source = new FixedSource(generateLinearBars(30))
      const cycle = new AnalysisCycle({ symbol: 'BTCUSDT', timeframe: '1m', document, source })

      cycle.start(60_000)
      expect(cycle.isRunning).toBe(true)
      await cycle.stop()

      expect(cycle.isRunning).toBe(false)
      expect(cycle.getLastResult()?.status).toBe('ok')
    })

    it('should refuse to start without a source', () => {
      const cycle = new AnalysisCycle({ symbol: 'BTCUSDT', timeframe: '1m', document })
      let caught: unknown
      try {
        cycle.start(1_000)
      } catch (e) {
        caught = e
      }
      expect(caught).toBeInstanceOf(TradingError)
      expect(caught instanceof TradingError && caught.code).toBe(ErrorCode.CONFIG_INVALID)
      expect(cycle.isRunning).toBe(false)
    })
  })
})
