// ============================================================
// Error Handling Module
// TradingError, Result and the central error handler
// ============================================================

export { ErrorCode, ErrorSeverity, ERROR_SEVERITY_MAP, ERROR_MESSAGES } from './error-codes'
export { TradingError, compareSeverity } from './trading-error'
export type {
  ErrorModule,
  ErrorContext,
  TradingErrorOptions,
  SerializedTradingError,
} from './trading-error'
export { Result } from './result'
export type { Success, Failure } from './result'
export { ErrorHandler, errorHandler } from './handler'
export type { ErrorLogEntry, ErrorStats, ErrorListener, ErrorHandlerConfig } from './handler'
