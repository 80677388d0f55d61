import { TradingError, compareSeverity } from './trading-error';
import type { ErrorContext, SerializedTradingError } from './trading-error';
import { ErrorCode, ErrorSeverity } from './error-codes';
import { createLogger } from '../logger';

const logger = createLogger('ErrorHandler');

export interface ErrorLogEntry {
  id: string;
  error: SerializedTradingError;
  timestamp: number;
  handled: boolean;
}

export interface ErrorStats {
  total: number;
  byCode: Record<string, number>;
  byModule: Record<string, number>;
  bySeverity: Record<ErrorSeverity, number>;
  lastErrorAt?: number;
}

export type ErrorListener = (error: TradingError, entry: ErrorLogEntry) => void;

export interface ErrorHandlerConfig {
  /** max history size */
  maxHistory: number;
  /** write handled errors to the logger */
  consoleLogging: boolean;
  /** minimum severity written to the logger */
  minLogSeverity: ErrorSeverity;
}

const DEFAULT_CONFIG: ErrorHandlerConfig = {
  maxHistory: 100,
  consoleLogging: true,
  minLogSeverity: ErrorSeverity.INFO,
};

/**
 * Central error handler
 *
 * Contained errors (indicator failures, regime evaluation faults, broker
 * failures in the analysis loop) go through here so they are logged,
 * counted and fanned out to listeners.
 *
 * @example
 * ```typescript
 * try {
 *   await cycle.runOnce();
 * } catch (e) {
 *   errorHandler.handle(e, { module: 'lib/analysis', function: 'tick' });
 * }
 * ```
 */
export class ErrorHandler {
  private history: ErrorLogEntry[] = [];
  private listeners: ErrorListener[] = [];
  private readonly config: ErrorHandlerConfig;
  private sequence = 0;

  constructor(config: Partial<ErrorHandlerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Normalize an unknown error to TradingError, log it and notify listeners
   */
  handle(
    error: unknown,
    context?: Partial<ErrorContext>,
    code?: ErrorCode
  ): TradingError {
    const tradingError = TradingError.from(error, context, code);
    const entry = this.log(tradingError);
    this.notify(tradingError, entry);
    return tradingError;
  }

  private log(error: TradingError): ErrorLogEntry {
    const entry: ErrorLogEntry = {
      id: this.generateId(),
      error: error.toJSON(),
      timestamp: Date.now(),
      handled: true,
    };

    this.history.unshift(entry);
    if (this.history.length > this.config.maxHistory) {
      this.history.pop();
    }

    if (
      this.config.consoleLogging &&
      compareSeverity(error.severity, this.config.minLogSeverity) >= 0
    ) {
      this.writeLog(error);
    }

    return entry;
  }

  private writeLog(error: TradingError): void {
    switch (error.severity) {
      case ErrorSeverity.INFO:
        logger.info(error.toShortString());
        break;
      case ErrorSeverity.WARNING:
        logger.warn(error.toShortString());
        break;
      case ErrorSeverity.ERROR:
        logger.error(error.toReadableString());
        break;
      case ErrorSeverity.CRITICAL:
        logger.halt(error.toReadableString());
        break;
    }
  }

  private notify(error: TradingError, entry: ErrorLogEntry): void {
    for (const listener of this.listeners) {
      try {
        listener(error, entry);
      } catch (e) {
        // a failing listener must not re-enter the handler
        logger.error('Listener error:', e);
      }
    }
  }

  private generateId(): string {
    this.sequence += 1;
    return `${Date.now()}-${this.sequence}`;
  }

  /**
   * @returns unsubscribe function
   */
  onError(listener: ErrorListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  getHistory(limit?: number): ErrorLogEntry[] {
    if (limit) {
      return this.history.slice(0, limit);
    }
    return [...this.history];
  }

  getStats(): ErrorStats {
    const stats: ErrorStats = {
      total: this.history.length,
      byCode: {},
      byModule: {},
      bySeverity: {
        [ErrorSeverity.INFO]: 0,
        [ErrorSeverity.WARNING]: 0,
        [ErrorSeverity.ERROR]: 0,
        [ErrorSeverity.CRITICAL]: 0,
      },
      lastErrorAt: this.history[0]?.timestamp,
    };

    for (const entry of this.history) {
      const { code, severity, context } = entry.error;
      stats.byCode[code] = (stats.byCode[code] ?? 0) + 1;
      stats.byModule[context.module] = (stats.byModule[context.module] ?? 0) + 1;
      stats.bySeverity[severity]++;
    }

    return stats;
  }
}

/**
 * Process-wide handler instance
 */
export const errorHandler = new ErrorHandler();
