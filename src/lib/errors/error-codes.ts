/**
 * Error codes for TradingError
 * Classifies failures so callers can branch on them programmatically
 */
export enum ErrorCode {
  // ============================================
  // Indicator Errors (1xx)
  // ============================================
  INDICATOR_INSUFFICIENT_DATA = 'INDICATOR_INSUFFICIENT_DATA',
  INDICATOR_CALCULATION_FAILED = 'INDICATOR_CALCULATION_FAILED',
  INDICATOR_UNKNOWN_TYPE = 'INDICATOR_UNKNOWN_TYPE',

  // ============================================
  // Regime / Strategy Errors (2xx)
  // ============================================
  MALFORMED_CONDITION = 'MALFORMED_CONDITION',
  STRATEGY_INVALID_CONFIG = 'STRATEGY_INVALID_CONFIG',

  // ============================================
  // Order Lookup (3xx)
  // ============================================
  ORDER_NOT_FOUND = 'ORDER_NOT_FOUND',
  ORDER_INVALID_STATE = 'ORDER_INVALID_STATE',

  // ============================================
  // Broker Errors (4xx)
  // ============================================
  BROKER_ERROR = 'BROKER_ERROR',

  // ============================================
  // Validation / Config Errors (5xx)
  // ============================================
  VALIDATION_REQUIRED = 'VALIDATION_REQUIRED',
  VALIDATION_TYPE = 'VALIDATION_TYPE',
  VALIDATION_RANGE = 'VALIDATION_RANGE',
  VALIDATION_FORMAT = 'VALIDATION_FORMAT',
  CONFIG_INVALID = 'CONFIG_INVALID',
  CONFIG_READ_FAILED = 'CONFIG_READ_FAILED',

  // ============================================
  // Market Data Errors (6xx)
  // ============================================
  MARKET_DATA_UNAVAILABLE = 'MARKET_DATA_UNAVAILABLE',

  // ============================================
  // Unknown/Generic Errors (9xx)
  // ============================================
  UNKNOWN = 'UNKNOWN',
}

/**
 * Severity level of an error code
 */
export enum ErrorSeverity {
  /** informational, log only */
  INFO = 'INFO',
  /** needs attention */
  WARNING = 'WARNING',
  /** an operation failed */
  ERROR = 'ERROR',
  /** trading safety is affected */
  CRITICAL = 'CRITICAL',
}

/**
 * Default severity per error code
 */
export const ERROR_SEVERITY_MAP: Record<ErrorCode, ErrorSeverity> = {
  // Indicator
  [ErrorCode.INDICATOR_INSUFFICIENT_DATA]: ErrorSeverity.INFO,
  [ErrorCode.INDICATOR_CALCULATION_FAILED]: ErrorSeverity.WARNING,
  [ErrorCode.INDICATOR_UNKNOWN_TYPE]: ErrorSeverity.ERROR,

  // Regime / Strategy
  [ErrorCode.MALFORMED_CONDITION]: ErrorSeverity.WARNING,
  [ErrorCode.STRATEGY_INVALID_CONFIG]: ErrorSeverity.ERROR,

  // Pipeline
  [ErrorCode.ORDER_NOT_FOUND]: ErrorSeverity.WARNING,
  [ErrorCode.ORDER_INVALID_STATE]: ErrorSeverity.WARNING,

  // Broker
  [ErrorCode.BROKER_ERROR]: ErrorSeverity.ERROR,

  // Validation / Config
  [ErrorCode.VALIDATION_REQUIRED]: ErrorSeverity.ERROR,
  [ErrorCode.VALIDATION_TYPE]: ErrorSeverity.ERROR,
  [ErrorCode.VALIDATION_RANGE]: ErrorSeverity.ERROR,
  [ErrorCode.VALIDATION_FORMAT]: ErrorSeverity.ERROR,
  [ErrorCode.CONFIG_INVALID]: ErrorSeverity.ERROR,
  [ErrorCode.CONFIG_READ_FAILED]: ErrorSeverity.ERROR,

  // Market data
  [ErrorCode.MARKET_DATA_UNAVAILABLE]: ErrorSeverity.WARNING,

  // Unknown
  [ErrorCode.UNKNOWN]: ErrorSeverity.ERROR,
};

/**
 * Default message per error code
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  // Indicator
  [ErrorCode.INDICATOR_INSUFFICIENT_DATA]: 'Not enough bars to calculate indicator',
  [ErrorCode.INDICATOR_CALCULATION_FAILED]: 'Indicator calculation failed',
  [ErrorCode.INDICATOR_UNKNOWN_TYPE]: 'Unknown indicator type',

  // Regime / Strategy
  [ErrorCode.MALFORMED_CONDITION]: 'Malformed condition node',
  [ErrorCode.STRATEGY_INVALID_CONFIG]: 'Invalid strategy configuration',

  // Pipeline
  [ErrorCode.ORDER_NOT_FOUND]: 'Order not found',
  [ErrorCode.ORDER_INVALID_STATE]: 'Order is not in a resolvable state',

  // Broker
  [ErrorCode.BROKER_ERROR]: 'Broker adapter failed',

  // Validation / Config
  [ErrorCode.VALIDATION_REQUIRED]: 'Required value is missing',
  [ErrorCode.VALIDATION_TYPE]: 'Invalid type',
  [ErrorCode.VALIDATION_RANGE]: 'Value out of range',
  [ErrorCode.VALIDATION_FORMAT]: 'Invalid format',
  [ErrorCode.CONFIG_INVALID]: 'Invalid configuration',
  [ErrorCode.CONFIG_READ_FAILED]: 'Could not read configuration file',

  // Market data
  [ErrorCode.MARKET_DATA_UNAVAILABLE]: 'Market data unavailable',

  // Unknown
  [ErrorCode.UNKNOWN]: 'Unknown error',
};
