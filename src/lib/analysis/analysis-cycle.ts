// ============================================================
// Analysis Cycle
// ============================================================
// One (symbol, timeframe): bar buffer -> indicator snapshot -> active
// regimes -> signal -> optional order into the execution pipeline.
// While the pipeline holds a position, exit regimes are evaluated too and
// an active one closes the position instead of sending an entry.
// The polling loop skips a tick while the previous one is still running
// and routes every failure through the error handler.
// ============================================================

import type { StrategyDocument } from '../config/strategy-document'
import { ErrorCode, errorHandler } from '../errors'
import { IndicatorEngine, minBarsFor } from '../indicators/engine'
import type { SnapshotFailure } from '../indicators/engine'
import type { Bar, IndicatorDefinition, IndicatorSnapshot } from '../indicators/types'
import { loggers } from '../logger'
import { timeframeToMs } from '../market/types'
import type { IMarketDataSource, Timeframe, Unsubscribe } from '../market/types'
import { detectActiveRegimes, rankActiveRegimes } from '../regime/detector'
import { buildExitOrder, buildOrderRequest } from '../signals/order-builder'
import type { SizingConfig } from '../signals/order-builder'
import { generateSignal } from '../signals/signal-generator'
import type { TradeSignal } from '../signals/types'
import type { TelemetrySink } from '../telemetry'
import type { ExecutionPipeline } from '../trading/execution-pipeline'
import type { OrderRequest, SubmitResult } from '../trading/types'

const logger = loggers.analysis

export const DEFAULT_MAX_BARS = 500
export const DEFAULT_HISTORY_BARS = 200

export interface AnalysisCycleOptions {
  symbol: string
  timeframe: Timeframe
  document: StrategyDocument
  engine?: IndicatorEngine
  /** without a pipeline the cycle only produces signals */
  pipeline?: ExecutionPipeline
  sizing?: SizingConfig
  source?: IMarketDataSource
  telemetry?: TelemetrySink
  maxBars?: number
  historyBars?: number
}

export type CycleStatus = 'ok' | 'insufficient_data'

export interface CycleResult {
  status: CycleStatus
  symbol: string
  timestamp: number
  barCount: number
  snapshot: IndicatorSnapshot
  failures: SnapshotFailure[]
  /** highest priority first */
  activeRegimes: string[]
  /** exit regimes, evaluated only while a position is held */
  activeExitRegimes: string[]
  signal: TradeSignal | null
  order: OrderRequest | null
  submission?: SubmitResult
}

export type CycleListener = (result: CycleResult) => void

/**
 * Bars of `timeframe` needed for `def`; a coarser definition needs a
 * whole bucket of source bars for each of its own
 */
function requiredBarsFor(def: IndicatorDefinition, timeframe: Timeframe): number {
  const bars = minBarsFor(def.type, def.params)
  if (def.timeframe === undefined || def.timeframe === timeframe) return bars
  const targetMs = timeframeToMs(def.timeframe)
  const sourceMs = timeframeToMs(timeframe)
  if (targetMs === null || sourceMs === null || targetMs <= sourceMs) return bars
  return bars * Math.ceil(targetMs / sourceMs)
}

export class AnalysisCycle {
  readonly symbol: string
  readonly timeframe: Timeframe
  private readonly document: StrategyDocument
  private readonly engine: IndicatorEngine
  private readonly pipeline?: ExecutionPipeline
  private readonly sizing?: SizingConfig
  private readonly source?: IMarketDataSource
  private readonly telemetry?: TelemetrySink
  private readonly maxBars: number
  private readonly historyBars: number
  private readonly requiredBars: number

  private bars: Bar[] = []
  private listeners: CycleListener[] = []
  private lastResult: CycleResult | null = null
  private intervalId: ReturnType<typeof setInterval> | null = null
  private running: Promise<void> | null = null
  private skippedTicks = 0

  constructor(options: AnalysisCycleOptions) {
    this.symbol = options.symbol
    this.timeframe = options.timeframe
    this.document = options.document
    this.engine = options.engine ?? new IndicatorEngine()
    this.pipeline = options.pipeline
    this.sizing = options.sizing
    this.source = options.source
    this.telemetry = options.telemetry
    this.maxBars = options.maxBars ?? DEFAULT_MAX_BARS
    this.historyBars = options.historyBars ?? DEFAULT_HISTORY_BARS
    this.requiredBars = Math.max(1, ...options.document.indicators.map((d) => requiredBarsFor(d, options.timeframe)))
  }

  // ============================================================
  // Bar buffer
  // ============================================================

  /**
   * Replace the buffer, sorted, one bar per timestamp, newest maxBars kept
   */
  setHistory(bars: readonly Bar[]): void {
    const byTime = new Map<number, Bar>()
    for (const bar of bars) byTime.set(bar.timestamp, bar)
    this.bars = [...byTime.values()].sort((a, b) => a.timestamp - b.timestamp).slice(-this.maxBars)
  }

  /**
   * Append a closed bar. Bars not newer than the last one are ignored.
   */
  addBar(bar: Bar): boolean {
    const last = this.bars[this.bars.length - 1]
    if (last && bar.timestamp <= last.timestamp) {
      logger.debug(`${this.symbol}: ignoring bar ${bar.timestamp} (last ${last.timestamp})`)
      return false
    }
    this.bars.push(bar)
    if (this.bars.length > this.maxBars) this.bars.shift()
    return true
  }

  getBars(): readonly Bar[] {
    return this.bars
  }

  /** Bars needed before every declared indicator has a value */
  getRequiredBars(): number {
    return this.requiredBars
  }

  // ============================================================
  // One pass
  // ============================================================

  async runOnce(): Promise<CycleResult> {
    const bars = this.bars
    const timestamp = bars.length > 0 ? bars[bars.length - 1].timestamp : Date.now()

    if (bars.length < this.requiredBars) {
      logger.debug(`${this.symbol}: ${bars.length}/${this.requiredBars} bars, waiting`)
      return this.publish({
        status: 'insufficient_data',
        symbol: this.symbol,
        timestamp,
        barCount: bars.length,
        snapshot: {},
        failures: [],
        activeRegimes: [],
        activeExitRegimes: [],
        signal: null,
        order: null,
      })
    }

    const { snapshot, failures } = this.engine.buildSnapshot(bars, this.document.indicators, {
      symbol: this.symbol,
      timeframe: this.timeframe,
    })
    for (const failure of failures) {
      this.telemetry?.({
        stage: 'indicator',
        reason: failure.error.code,
        symbol: this.symbol,
        timestamp,
        detail: { indicatorId: failure.indicatorId, message: failure.error.message },
      })
    }

    const detectOptions = { symbol: this.symbol, timestamp, telemetry: this.telemetry }
    const active = detectActiveRegimes(snapshot, this.document.regimes, 'entry', detectOptions)
    const activeRegimes = rankActiveRegimes(active, this.document.regimes).map((r) => r.id)

    const position = this.pipeline?.getPositionQuantity(this.symbol) ?? 0
    const activeExitRegimes =
      position === 0
        ? []
        : rankActiveRegimes(
            detectActiveRegimes(snapshot, this.document.regimes, 'exit', detectOptions),
            this.document.regimes,
          ).map((r) => r.id)

    const signal = generateSignal(
      bars,
      snapshot,
      active,
      { strategies: this.document.strategies, regimes: this.document.regimes },
      { symbol: this.symbol, telemetry: this.telemetry },
    )

    const result: CycleResult = {
      status: 'ok',
      symbol: this.symbol,
      timestamp,
      barCount: bars.length,
      snapshot,
      failures,
      activeRegimes,
      activeExitRegimes,
      signal,
      order: null,
    }

    if (this.pipeline) {
      this.pipeline.updateMarkPrice(this.symbol, bars[bars.length - 1].close)
      if (activeExitRegimes.length > 0) {
        logger.info(`${this.symbol}: exit regime ${activeExitRegimes[0]} active, closing ${position}`)
        result.order = buildExitOrder(this.symbol, position)
      } else if (this.sizing) {
        result.order = buildOrderRequest(signal, this.sizing)
      }
      if (result.order) {
        result.submission = await this.pipeline.submitOrder(result.order)
      }
    }

    return this.publish(result)
  }

  private publish(result: CycleResult): CycleResult {
    this.lastResult = result
    for (const listener of this.listeners) {
      try {
        listener(result)
      } catch (e) {
        logger.error('Cycle listener error:', e)
      }
    }
    return result
  }

  onResult(listener: CycleListener): Unsubscribe {
    this.listeners.push(listener)
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener)
    }
  }

  getLastResult(): CycleResult | null {
    return this.lastResult
  }

  // ============================================================
  // Polling loop
  // ============================================================

  start(intervalMs: number): void {
    if (this.intervalId) return
    if (!this.source) {
      throw errorHandler.handle(new Error('AnalysisCycle.start needs a market data source'), {
        module: 'lib/analysis',
        function: 'start',
      }, ErrorCode.CONFIG_INVALID)
    }

    logger.start(`${this.symbol} ${this.timeframe} every ${intervalMs}ms`)
    this.intervalId = setInterval(() => {
      void this.tick()
    }, intervalMs)
    void this.tick()
  }

  /**
   * Stop polling; resolves after a tick already in progress finished
   */
  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId)
      this.intervalId = null
      logger.stop(`${this.symbol} ${this.timeframe}`)
    }
    if (this.running) await this.running
  }

  get isRunning(): boolean {
    return this.intervalId !== null
  }

  /** Ticks skipped because the previous one was still running */
  get skipped(): number {
    return this.skippedTicks
  }

  /**
   * One poll. Never rejects: failures go to the error handler.
   */
  tick(): Promise<void> {
    if (this.running) {
      this.skippedTicks++
      logger.debug(`${this.symbol}: previous cycle still running, tick skipped`)
      return this.running
    }

    this.running = this.poll()
      .catch((e: unknown) => {
        errorHandler.handle(e, { module: 'lib/analysis', function: 'tick', extra: { symbol: this.symbol } })
      })
      .finally(() => {
        this.running = null
      })
    return this.running
  }

  private async poll(): Promise<void> {
    const source = this.source
    if (!source) return

    if (this.bars.length === 0) {
      this.setHistory(await source.fetchBars(this.symbol, this.timeframe, this.historyBars))
    } else {
      const latest = await source.fetchBars(this.symbol, this.timeframe, 5)
      for (const bar of latest) this.addBar(bar)
    }

    await this.runOnce()
  }
}
