import path from 'path'
import { fileURLToPath } from 'url'
import { AnalysisCycle } from '../src/lib/analysis'
import { PaperBroker } from '../src/lib/broker'
import { applyLoggingConfig, loadAppConfig, loadStrategyDocument } from '../src/lib/config'
import { errorHandler } from '../src/lib/errors'
import { IndicatorEngine } from '../src/lib/indicators/engine'
import { loggers } from '../src/lib/logger'
import { SyntheticMarketDataSource } from '../src/lib/market/synthetic-source'
import { TelemetryHub } from '../src/lib/telemetry'
import { ExecutionPipeline } from '../src/lib/trading/execution-pipeline'
import { RiskManager } from '../src/lib/trading/risk-manager'
import { startControlServer } from '../src/server'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

// ============================================================
// Paper Bot
// ============================================================
// Runs the analysis loop for every configured symbol against synthetic
// bars and a paper broker, with the control server for approvals.
//
//   npm run paper
//   RG_CONFIG=config/app.json RG_REQUIRE_APPROVAL=false npm run paper
// ============================================================

const logger = loggers.main
const PROJECT_ROOT = process.env.PROJECT_ROOT || path.resolve(__dirname, '..')

async function main(): Promise<void> {
  const configPath = process.env.RG_CONFIG ? path.resolve(PROJECT_ROOT, process.env.RG_CONFIG) : undefined
  const loaded = await loadAppConfig({ path: configPath })
  if (!loaded.success) {
    logger.error(loaded.error.toShortString())
    process.exitCode = 1
    return
  }
  const config = loaded.data
  applyLoggingConfig(config)

  const document = await loadStrategyDocument(path.resolve(PROJECT_ROOT, config.analysis.strategyPath))
  if (!document.success) {
    logger.error(document.error.toShortString())
    process.exitCode = 1
    return
  }

  const telemetry = new TelemetryHub()
  const source = new SyntheticMarketDataSource({}, config.analysis.historyBars)
  const broker = new PaperBroker({
    slippage: 0.0005,
    quote: (symbol) => source.lastPrice(symbol, config.analysis.timeframe),
  })
  const risk = new RiskManager({ limits: config.risk, initialEquity: config.pipeline.initialEquity })
  const pipeline = new ExecutionPipeline(
    { broker, risk, telemetry: telemetry.sink },
    { ...config.pipeline, limits: config.limits },
  )
  pipeline.onOrderStateChanged((event) => {
    logger.info(`${event.orderId} ${event.symbol}: ${event.from ?? 'new'} -> ${event.to}${event.reason ? ` (${event.reason})` : ''}`)
  })

  const engine = new IndicatorEngine()
  const cycles = config.analysis.symbols.map((symbol) => {
    const cycle = new AnalysisCycle({
      symbol,
      timeframe: config.analysis.timeframe,
      document: document.data,
      engine,
      pipeline,
      sizing: config.sizing,
      source,
      telemetry: telemetry.sink,
      maxBars: config.analysis.maxBars,
      historyBars: config.analysis.historyBars,
    })
    cycle.onResult((result) => {
      const direction = result.signal?.direction ?? '-'
      const exits = result.activeExitRegimes.length > 0 ? ` exit: ${result.activeExitRegimes.join(', ')}` : ''
      logger.info(`${symbol} [${result.activeRegimes.join(', ') || 'no regime'}] ${direction}${exits}`)
    })
    return cycle
  })

  const server = await startControlServer(pipeline, config.server)

  const clock = setInterval(() => source.advance(), config.analysis.intervalMs)
  for (const cycle of cycles) cycle.start(config.analysis.intervalMs)

  const shutdown = async (): Promise<void> => {
    logger.stop('Shutting down')
    clearInterval(clock)
    await Promise.all(cycles.map((c) => c.stop()))
    await pipeline.whenIdle()
    server.close()
    logger.info(`Telemetry: ${JSON.stringify(telemetry.getCounters())}`)
  }
  process.once('SIGINT', () => {
    shutdown().catch((e: unknown) => {
      errorHandler.handle(e, { module: 'scripts', function: 'shutdown' })
      process.exitCode = 1
    })
  })
}

main().catch((e: unknown) => {
  errorHandler.handle(e, { module: 'scripts', function: 'main' })
  process.exitCode = 1
})
