// ============================================================
// Regime Gate Logger
// ============================================================
// Centralized logging with module prefixes and log levels
// ============================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none'

export interface LoggerConfig {
  level: LogLevel
  enabledModules: string[] | '*'  // '*' means all modules
  disabledModules: string[]
  showTimestamp: boolean
  showModule: boolean
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'none']

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  enabledModules: '*',
  disabledModules: [],
  showTimestamp: false,
  showModule: true
}

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG }

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

// RG_LOG_LEVEL overrides the default level at startup
function loadConfig(): void {
  const fromEnv = process.env.RG_LOG_LEVEL
  if (fromEnv && isLogLevel(fromEnv)) {
    globalConfig = { ...globalConfig, level: fromEnv }
  }
}

loadConfig()

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config }
}

export function resetLogger(): void {
  globalConfig = { ...DEFAULT_CONFIG }
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig }
}

function shouldLog(level: LogLevel, module: string): boolean {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[globalConfig.level]) {
    return false
  }

  if (globalConfig.disabledModules.includes(module)) {
    return false
  }

  if (globalConfig.enabledModules === '*') {
    return true
  }

  return globalConfig.enabledModules.includes(module)
}

export function formatMessage(module: string, message: string, now: Date = new Date()): string {
  const parts: string[] = ['[RG]']

  if (globalConfig.showTimestamp) {
    parts.push(`[${now.toISOString()}]`)
  }

  if (globalConfig.showModule && module) {
    parts.push(`[${module}]`)
  }

  parts.push(message)
  return parts.join(' ')
}

export class Logger {
  private module: string

  constructor(module: string) {
    this.module = module
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!shouldLog(level, this.module)) return

    const formatted = formatMessage(this.module, message)

    switch (level) {
      case 'debug':
        console.debug(formatted, ...args)
        break
      case 'info':
        console.log(formatted, ...args)
        break
      case 'warn':
        console.warn(formatted, ...args)
        break
      case 'error':
        console.error(formatted, ...args)
        break
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, ...args)
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, ...args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, ...args)
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, ...args)
  }

  // Convenience methods with emojis
  start(message: string, ...args: unknown[]): void {
    this.log('info', `🚀 ${message}`, ...args)
  }

  stop(message: string, ...args: unknown[]): void {
    this.log('info', `⏹ ${message}`, ...args)
  }

  signal(message: string, ...args: unknown[]): void {
    this.log('info', `🎯 ${message}`, ...args)
  }

  trade(message: string, ...args: unknown[]): void {
    this.log('info', `💰 ${message}`, ...args)
  }

  halt(message: string, ...args: unknown[]): void {
    this.log('error', `🛑 ${message}`, ...args)
  }
}

// Pre-configured module loggers
export const loggers = {
  indicators: new Logger('Indicators'),
  regime: new Logger('Regime'),
  signal: new Logger('Signal'),
  pipeline: new Logger('Pipeline'),
  risk: new Logger('Risk'),
  broker: new Logger('Broker'),
  analysis: new Logger('Analysis'),
  server: new Logger('Server'),
  main: new Logger('Main')
}

// Factory function for custom modules
export function createLogger(module: string): Logger {
  return new Logger(module)
}

// Global helper for quick logging (uses 'Main' module)
export const log = loggers.main
