import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest'
import {
  Logger,
  configureLogger,
  getLoggerConfig,
  createLogger,
  resetLogger,
  formatMessage,
  isLogLevel,
} from './index'

describe('Logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {})
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})

    configureLogger({
      level: 'debug',
      enabledModules: '*',
      disabledModules: [],
      showTimestamp: false,
      showModule: true,
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  // ============================================================
  // Basic logging
  // ============================================================
  describe('basic logging', () => {
    it('writes debug to console.debug with prefix and module', () => {
      new Logger('Test').debug('debug message')
      expect(console.debug).toHaveBeenCalledWith('[RG] [Test] debug message')
    })

    it('writes info to console.log', () => {
      new Logger('Test').info('info message')
      expect(console.log).toHaveBeenCalledWith('[RG] [Test] info message')
    })

    it('writes warn to console.warn', () => {
      new Logger('Test').warn('warn message')
      expect(console.warn).toHaveBeenCalledWith('[RG] [Test] warn message')
    })

    it('writes error to console.error', () => {
      new Logger('Test').error('error message')
      expect(console.error).toHaveBeenCalledWith('[RG] [Test] error message')
    })

    it('passes extra arguments through', () => {
      const extra = { key: 'value' }
      new Logger('Test').info('msg', extra)
      expect(console.log).toHaveBeenCalledWith('[RG] [Test] msg', extra)
    })
  })

  // ============================================================
  // Log level filtering
  // ============================================================
  describe('log level filtering', () => {
    it('filters debug at info', () => {
      configureLogger({ level: 'info' })
      new Logger('Test').debug('should be filtered')
      expect(console.debug).not.toHaveBeenCalled()
    })

    it('filters info and debug at warn', () => {
      configureLogger({ level: 'warn' })
      const logger = new Logger('Test')
      logger.debug('filtered')
      logger.info('filtered')
      logger.warn('shown')
      expect(console.debug).not.toHaveBeenCalled()
      expect(console.log).not.toHaveBeenCalled()
      expect(console.warn).toHaveBeenCalled()
    })

    it('filters everything at none', () => {
      configureLogger({ level: 'none' })
      const logger = new Logger('Test')
      logger.debug('filtered')
      logger.info('filtered')
      logger.warn('filtered')
      logger.error('filtered')
      expect(console.debug).not.toHaveBeenCalled()
      expect(console.log).not.toHaveBeenCalled()
      expect(console.warn).not.toHaveBeenCalled()
      expect(console.error).not.toHaveBeenCalled()
    })
  })

  // ============================================================
  // Module filtering
  // ============================================================
  describe('module filtering', () => {
    it('mutes disabled modules', () => {
      configureLogger({ disabledModules: ['Muted'] })
      new Logger('Muted').info('should be muted')
      expect(console.log).not.toHaveBeenCalled()
    })

    it('only writes enabled modules when a list is given', () => {
      configureLogger({ enabledModules: ['Allowed'] })
      new Logger('Allowed').info('shown')
      new Logger('Blocked').info('filtered')
      expect(console.log).toHaveBeenCalledTimes(1)
    })
  })

  // ============================================================
  // Convenience methods
  // ============================================================
  describe('convenience methods', () => {
    it('trade writes at info with an emoji prefix', () => {
      new Logger('Pipeline').trade('filled')
      expect(console.log).toHaveBeenCalledWith('[RG] [Pipeline] 💰 filled')
    })

    it('halt writes at error', () => {
      new Logger('Pipeline').halt('kill switch')
      expect(console.error).toHaveBeenCalledWith('[RG] [Pipeline] 🛑 kill switch')
    })

    it('signal and start write at info', () => {
      const logger = createLogger('Signal')
      logger.signal('long')
      logger.start('cycle')
      expect(console.log).toHaveBeenCalledTimes(2)
    })
  })

  // ============================================================
  // Config management
  // ============================================================
  describe('configuration', () => {
    it('updates and returns a copy', () => {
      configureLogger({ level: 'warn', showTimestamp: true })
      const c1 = getLoggerConfig()
      const c2 = getLoggerConfig()
      expect(c1.level).toBe('warn')
      expect(c1.showTimestamp).toBe(true)
      expect(c1).not.toBe(c2)
      expect(c1).toEqual(c2)
    })

    it('resetLogger restores defaults', () => {
      configureLogger({ level: 'none', showTimestamp: true })
      resetLogger()
      const config = getLoggerConfig()
      expect(config.level).toBe('info')
      expect(config.showTimestamp).toBe(false)
    })

    it('formatMessage adds an ISO timestamp when enabled', () => {
      configureLogger({ showTimestamp: true })
      const line = formatMessage('Risk', 'reset', new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))
      expect(line).toBe('[RG] [2024-01-02T03:04:05.000Z] [Risk] reset')
    })

    it('isLogLevel accepts only known levels', () => {
      expect(isLogLevel('warn')).toBe(true)
      expect(isLogLevel('verbose')).toBe(false)
    })
  })
})
