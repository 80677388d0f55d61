// ============================================================
// AppConfig - runtime settings
// ============================================================
// Defaults, overlaid by an optional JSON file, overlaid by RG_*
// environment variables. Every value is type-checked on the way in;
// the first bad one fails the load with CONFIG_INVALID.
// ============================================================

import { readFile } from 'node:fs/promises'
import { ErrorCode, Result, TradingError } from '../errors'
import { configureLogger, isLogLevel } from '../logger'
import type { LogLevel } from '../logger'
import { DEFAULT_PIPELINE_CONFIG } from '../trading/execution-pipeline'
import { DEFAULT_POSITION_LIMITS } from '../trading/position-limits'
import type { PositionLimits } from '../trading/position-limits'
import { DEFAULT_RISK_LIMITS } from '../trading/risk-manager'
import type { RiskLimits } from '../trading/risk-manager'

export interface AnalysisSettings {
  symbols: string[]
  timeframe: string
  /** polling interval of the analysis loop */
  intervalMs: number
  /** bars fetched when a cycle starts */
  historyBars: number
  /** bar buffer size per symbol */
  maxBars: number
  strategyPath: string
}

export interface PipelineSettings {
  maxPendingOrders: number
  requireApproval: boolean
  approvalTimeoutMs: number
  duplicateWindowMs: number
  maxRecentOrders: number
  initialEquity: number
}

export interface SizingSettings {
  baseQuantity: number
  scaleByStrength: boolean
  /** 0 disables lot rounding */
  quantityStep: number
}

export interface ServerSettings {
  host: string
  port: number
  /** browser origins allowed to call the control server; none by default */
  allowedOrigins: string[]
}

export interface LoggingSettings {
  level: LogLevel
  showTimestamp: boolean
}

export interface AppConfig {
  analysis: AnalysisSettings
  pipeline: PipelineSettings
  risk: RiskLimits
  limits: PositionLimits
  sizing: SizingSettings
  server: ServerSettings
  logging: LoggingSettings
}

export const DEFAULT_ANALYSIS_SETTINGS: AnalysisSettings = {
  symbols: ['BTCUSDT'],
  timeframe: '1m',
  intervalMs: 60_000,
  historyBars: 200,
  maxBars: 500,
  strategyPath: 'config/strategies/default.json',
}

export const DEFAULT_CONFIG: AppConfig = {
  analysis: DEFAULT_ANALYSIS_SETTINGS,
  pipeline: {
    maxPendingOrders: DEFAULT_PIPELINE_CONFIG.maxPendingOrders,
    requireApproval: DEFAULT_PIPELINE_CONFIG.requireApproval,
    approvalTimeoutMs: DEFAULT_PIPELINE_CONFIG.approvalTimeoutMs,
    duplicateWindowMs: DEFAULT_PIPELINE_CONFIG.duplicateWindowMs,
    maxRecentOrders: DEFAULT_PIPELINE_CONFIG.maxRecentOrders,
    initialEquity: DEFAULT_PIPELINE_CONFIG.initialEquity,
  },
  risk: DEFAULT_RISK_LIMITS,
  limits: DEFAULT_POSITION_LIMITS,
  sizing: { baseQuantity: 1, scaleByStrength: false, quantityStep: 0 },
  server: { host: '127.0.0.1', port: 8787, allowedOrigins: [] },
  logging: { level: 'info', showTimestamp: false },
}

// ============================================================
// Environment overrides
// ============================================================

type EnvKind = 'number' | 'boolean' | 'string' | 'list'

interface EnvBinding {
  env: string
  section: keyof AppConfig
  key: string
  kind: EnvKind
}

export const ENV_BINDINGS: readonly EnvBinding[] = [
  { env: 'RG_SYMBOLS', section: 'analysis', key: 'symbols', kind: 'list' },
  { env: 'RG_TIMEFRAME', section: 'analysis', key: 'timeframe', kind: 'string' },
  { env: 'RG_INTERVAL_MS', section: 'analysis', key: 'intervalMs', kind: 'number' },
  { env: 'RG_STRATEGY_PATH', section: 'analysis', key: 'strategyPath', kind: 'string' },
  { env: 'RG_REQUIRE_APPROVAL', section: 'pipeline', key: 'requireApproval', kind: 'boolean' },
  { env: 'RG_MAX_PENDING_ORDERS', section: 'pipeline', key: 'maxPendingOrders', kind: 'number' },
  { env: 'RG_DUPLICATE_WINDOW_MS', section: 'pipeline', key: 'duplicateWindowMs', kind: 'number' },
  { env: 'RG_INITIAL_EQUITY', section: 'pipeline', key: 'initialEquity', kind: 'number' },
  { env: 'RG_MAX_DAILY_TRADES', section: 'risk', key: 'maxDailyTrades', kind: 'number' },
  { env: 'RG_MAX_DAILY_LOSS', section: 'risk', key: 'maxDailyLoss', kind: 'number' },
  { env: 'RG_MAX_DRAWDOWN_PERCENT', section: 'risk', key: 'maxDrawdownPercent', kind: 'number' },
  { env: 'RG_BASE_QUANTITY', section: 'sizing', key: 'baseQuantity', kind: 'number' },
  { env: 'RG_SERVER_HOST', section: 'server', key: 'host', kind: 'string' },
  { env: 'RG_SERVER_PORT', section: 'server', key: 'port', kind: 'number' },
  { env: 'RG_ALLOWED_ORIGINS', section: 'server', key: 'allowedOrigins', kind: 'list' },
  { env: 'RG_LOG_LEVEL', section: 'logging', key: 'level', kind: 'string' },
]

function configError(message: string, field: string, fn: string): TradingError {
  return new TradingError({
    code: ErrorCode.CONFIG_INVALID,
    message,
    context: { module: 'lib/config', function: fn, extra: { field } },
  })
}

function parseEnvValue(binding: EnvBinding, value: string): unknown {
  switch (binding.kind) {
    case 'number': {
      const n = Number(value)
      if (value.trim() === '' || !Number.isFinite(n)) {
        throw configError(`${binding.env} must be a number (value: ${value})`, binding.env, 'readEnv')
      }
      return n
    }
    case 'boolean':
      if (value === 'true' || value === '1') return true
      if (value === 'false' || value === '0') return false
      throw configError(`${binding.env} must be true or false (value: ${value})`, binding.env, 'readEnv')
    case 'list':
      return value
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s !== '')
    case 'string':
      return value
  }
}

/**
 * RG_* variables as a partial config object (still unvalidated)
 */
export function readEnv(env: NodeJS.ProcessEnv): Record<string, Record<string, unknown>> {
  const out: Record<string, Record<string, unknown>> = {}
  for (const binding of ENV_BINDINGS) {
    const value = env[binding.env]
    if (value === undefined) continue
    const section = out[binding.section] ?? {}
    section[binding.key] = parseEnvValue(binding, value)
    out[binding.section] = section
  }
  return out
}

// ============================================================
// Typed section readers
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Reads one section from layered sources, last layer wins */
class SectionReader {
  constructor(
    private readonly name: string,
    private readonly layers: Record<string, unknown>[],
  ) {}

  private raw(key: string): unknown {
    let value: unknown
    for (const layer of this.layers) {
      if (key in layer) value = layer[key]
    }
    return value
  }

  private field(key: string): string {
    return `${this.name}.${key}`
  }

  number(key: string, fallback: number, { positive = false, integer = false } = {}): number {
    const value = this.raw(key)
    if (value === undefined) return fallback
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw configError(`${this.field(key)} must be a finite number`, this.field(key), 'loadAppConfig')
    }
    if (positive ? value <= 0 : value < 0) {
      throw configError(
        `${this.field(key)} must be ${positive ? 'greater than 0' : 'at least 0'} (value: ${value})`,
        this.field(key),
        'loadAppConfig',
      )
    }
    if (integer && !Number.isInteger(value)) {
      throw configError(`${this.field(key)} must be an integer (value: ${value})`, this.field(key), 'loadAppConfig')
    }
    return value
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.raw(key)
    if (value === undefined) return fallback
    if (typeof value !== 'boolean') {
      throw configError(`${this.field(key)} must be a boolean`, this.field(key), 'loadAppConfig')
    }
    return value
  }

  string(key: string, fallback: string): string {
    const value = this.raw(key)
    if (value === undefined) return fallback
    if (typeof value !== 'string' || value.trim() === '') {
      throw configError(`${this.field(key)} must be a non-empty string`, this.field(key), 'loadAppConfig')
    }
    return value
  }

  stringList(key: string, fallback: string[], { allowEmpty = false } = {}): string[] {
    const value = this.raw(key)
    if (value === undefined) return [...fallback]
    if (!Array.isArray(value) || (!allowEmpty && value.length === 0)) {
      throw configError(
        `${this.field(key)} must be ${allowEmpty ? 'an' : 'a non-empty'} array of strings`,
        this.field(key),
        'loadAppConfig',
      )
    }
    const list: unknown[] = value
    const out: string[] = []
    for (const item of list) {
      if (typeof item !== 'string' || item.trim() === '') {
        throw configError(`${this.field(key)} must only contain non-empty strings`, this.field(key), 'loadAppConfig')
      }
      out.push(item)
    }
    return out
  }
}

function sectionLayers(name: keyof AppConfig, sources: readonly unknown[]): Record<string, unknown>[] {
  const layers: Record<string, unknown>[] = []
  for (const source of sources) {
    if (!isRecord(source)) continue
    const section = source[name]
    if (section === undefined) continue
    if (!isRecord(section)) {
      throw configError(`${name} must be an object`, name, 'loadAppConfig')
    }
    layers.push(section)
  }
  return layers
}

function buildConfig(sources: readonly unknown[]): AppConfig {
  const d = DEFAULT_CONFIG
  const reader = (name: keyof AppConfig) => new SectionReader(name, sectionLayers(name, sources))

  const a = reader('analysis')
  const p = reader('pipeline')
  const r = reader('risk')
  const l = reader('limits')
  const s = reader('sizing')
  const srv = reader('server')
  const log = reader('logging')

  const level = log.string('level', d.logging.level)
  if (!isLogLevel(level)) {
    throw configError(`logging.level must be one of debug, info, warn, error, none (value: ${level})`, 'logging.level', 'loadAppConfig')
  }

  return {
    analysis: {
      symbols: a.stringList('symbols', d.analysis.symbols),
      timeframe: a.string('timeframe', d.analysis.timeframe),
      intervalMs: a.number('intervalMs', d.analysis.intervalMs, { positive: true }),
      historyBars: a.number('historyBars', d.analysis.historyBars, { positive: true, integer: true }),
      maxBars: a.number('maxBars', d.analysis.maxBars, { positive: true, integer: true }),
      strategyPath: a.string('strategyPath', d.analysis.strategyPath),
    },
    pipeline: {
      maxPendingOrders: p.number('maxPendingOrders', d.pipeline.maxPendingOrders, { positive: true, integer: true }),
      requireApproval: p.boolean('requireApproval', d.pipeline.requireApproval),
      approvalTimeoutMs: p.number('approvalTimeoutMs', d.pipeline.approvalTimeoutMs, { positive: true }),
      duplicateWindowMs: p.number('duplicateWindowMs', d.pipeline.duplicateWindowMs),
      maxRecentOrders: p.number('maxRecentOrders', d.pipeline.maxRecentOrders, { positive: true, integer: true }),
      initialEquity: p.number('initialEquity', d.pipeline.initialEquity, { positive: true }),
    },
    risk: {
      maxDailyTrades: r.number('maxDailyTrades', d.risk.maxDailyTrades, { integer: true }),
      maxDailyLoss: r.number('maxDailyLoss', d.risk.maxDailyLoss),
      maxOpenPositions: r.number('maxOpenPositions', d.risk.maxOpenPositions, { integer: true }),
      maxConsecutiveLosses: r.number('maxConsecutiveLosses', d.risk.maxConsecutiveLosses, { positive: true, integer: true }),
      lossCooldownMs: r.number('lossCooldownMs', d.risk.lossCooldownMs),
      maxDrawdownPercent: r.number('maxDrawdownPercent', d.risk.maxDrawdownPercent, { positive: true }),
    },
    limits: {
      maxOrderQuantity: l.number('maxOrderQuantity', d.limits.maxOrderQuantity, { positive: true }),
      maxPositionQuantity: l.number('maxPositionQuantity', d.limits.maxPositionQuantity, { positive: true }),
      maxPositionNotional: l.number('maxPositionNotional', d.limits.maxPositionNotional, { positive: true }),
      maxAccountExposure: l.number('maxAccountExposure', d.limits.maxAccountExposure, { positive: true }),
      maxLeverage: l.number('maxLeverage', d.limits.maxLeverage, { positive: true }),
    },
    sizing: {
      baseQuantity: s.number('baseQuantity', d.sizing.baseQuantity, { positive: true }),
      scaleByStrength: s.boolean('scaleByStrength', d.sizing.scaleByStrength),
      quantityStep: s.number('quantityStep', d.sizing.quantityStep),
    },
    server: {
      host: srv.string('host', d.server.host),
      port: srv.number('port', d.server.port, { integer: true }),
      allowedOrigins: srv.stringList('allowedOrigins', d.server.allowedOrigins, { allowEmpty: true }),
    },
    logging: {
      level,
      showTimestamp: log.boolean('showTimestamp', d.logging.showTimestamp),
    },
  }
}

// ============================================================
// Load
// ============================================================

export interface LoadConfigOptions {
  /** JSON file; skipped when absent */
  path?: string
  /** defaults to process.env */
  env?: NodeJS.ProcessEnv
}

/**
 * Defaults <- parsed file contents <- environment, validated
 */
export function resolveAppConfig(fileContents: unknown, env: NodeJS.ProcessEnv = {}): Result<AppConfig> {
  try {
    if (fileContents !== undefined && !isRecord(fileContents)) {
      throw configError('Config file must contain a JSON object', '$', 'resolveAppConfig')
    }
    return Result.ok(buildConfig([fileContents, readEnv(env)]))
  } catch (e) {
    return Result.err(TradingError.from(e, { module: 'lib/config', function: 'resolveAppConfig' }, ErrorCode.CONFIG_INVALID))
  }
}

export async function loadAppConfig(options: LoadConfigOptions = {}): Promise<Result<AppConfig>> {
  let fileContents: unknown
  if (options.path) {
    try {
      fileContents = JSON.parse(await readFile(options.path, 'utf8'))
    } catch (e) {
      return Result.err(
        TradingError.from(
          e,
          { module: 'lib/config', function: 'loadAppConfig', extra: { path: options.path } },
          ErrorCode.CONFIG_READ_FAILED,
        ),
      )
    }
  }
  return resolveAppConfig(fileContents, options.env ?? process.env)
}

export function applyLoggingConfig(config: AppConfig): void {
  configureLogger({ level: config.logging.level, showTimestamp: config.logging.showTimestamp })
}

export { parseStrategyDocument, loadStrategyDocument, toStrategyConfig, SUPPORTED_SCHEMA_VERSION } from './strategy-document'
export type { StrategyDocument } from './strategy-document'
