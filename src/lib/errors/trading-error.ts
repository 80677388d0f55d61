import {
  ErrorCode,
  ErrorSeverity,
  ERROR_SEVERITY_MAP,
  ERROR_MESSAGES,
} from './error-codes';

/**
 * Module an error originated in
 */
export type ErrorModule =
  | 'lib'
  | 'lib/indicators'
  | 'lib/regime'
  | 'lib/signals'
  | 'lib/trading'
  | 'lib/analysis'
  | 'lib/broker'
  | 'lib/market'
  | 'lib/config'
  | 'lib/errors'
  | 'server'
  | 'scripts';

/**
 * Where an error happened and how it propagated
 */
export interface ErrorContext {
  /** module the error was raised in */
  module: ErrorModule;
  /** function the error was raised in */
  function: string;
  /** propagation path, origin first */
  path: string[];
  /** Unix timestamp (ms) */
  timestamp: number;
  /** extra debug info */
  extra?: Record<string, unknown>;
}

export interface TradingErrorOptions {
  code: ErrorCode;
  /** falls back to the code's default message */
  message?: string;
  context?: Partial<ErrorContext>;
  cause?: Error;
  /** falls back to the code's default severity */
  severity?: ErrorSeverity;
}

/**
 * JSON form of a TradingError, as kept in the error handler history
 */
export interface SerializedTradingError {
  name: 'TradingError';
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context: ErrorContext;
  cause?: string;
  stack?: string;
}

const SEVERITY_ORDER: ErrorSeverity[] = [
  ErrorSeverity.INFO,
  ErrorSeverity.WARNING,
  ErrorSeverity.ERROR,
  ErrorSeverity.CRITICAL,
];

/**
 * Project error class
 *
 * - ErrorCode classifies the failure
 * - ErrorContext tracks origin and propagation path
 * - cause chains the underlying error
 *
 * @example
 * ```typescript
 * throw new TradingError({
 *   code: ErrorCode.STRATEGY_INVALID_CONFIG,
 *   message: 'rsi period must be a positive integer',
 *   context: { module: 'lib/indicators', function: 'calculate' },
 * });
 *
 * catch (e) {
 *   throw TradingError.from(e, { module: 'lib/analysis', function: 'runOnce' });
 * }
 * ```
 */
export class TradingError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  override readonly cause?: Error;

  constructor(options: TradingErrorOptions) {
    const message = options.message ?? ERROR_MESSAGES[options.code];
    super(message);

    this.name = 'TradingError';
    this.code = options.code;
    this.severity = options.severity ?? ERROR_SEVERITY_MAP[options.code];
    this.cause = options.cause;

    this.context = {
      module: options.context?.module ?? 'lib',
      function: options.context?.function ?? 'unknown',
      path: options.context?.path ?? [],
      timestamp: options.context?.timestamp ?? Date.now(),
      extra: options.context?.extra,
    };

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TradingError);
    }
  }

  setExtra(extra: Record<string, unknown>): this {
    this.context.extra = { ...this.context.extra, ...extra };
    return this;
  }

  /**
   * Multi-line form for console output
   */
  toReadableString(): string {
    const lines = [
      `[${this.severity}] ${this.code}`,
      `Message: ${this.message}`,
      `Module: ${this.context.module}`,
      `Function: ${this.context.function}`,
    ];

    if (this.context.path.length > 0) {
      lines.push(`Path: ${this.context.path.join(' -> ')}`);
    }

    lines.push(`Time: ${new Date(this.context.timestamp).toISOString()}`);

    if (this.context.extra) {
      lines.push(`Extra: ${JSON.stringify(this.context.extra)}`);
    }

    if (this.cause) {
      lines.push(`Caused by: ${this.cause.message}`);
    }

    return lines.join('\n');
  }

  /**
   * One-line summary
   */
  toShortString(): string {
    const path = this.context.path.length > 0 ? ` (${this.context.path.join('->')})` : '';
    return `[${this.code}] ${this.message} @ ${this.context.module}.${this.context.function}${path}`;
  }

  toJSON(): SerializedTradingError {
    return {
      name: 'TradingError',
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }

  /**
   * Normalize an unknown thrown value, for use in catch blocks
   */
  static from(
    error: unknown,
    context?: Partial<ErrorContext>,
    code: ErrorCode = ErrorCode.UNKNOWN
  ): TradingError {
    if (error instanceof TradingError) {
      if (context) {
        if (context.module) error.context.module = context.module;
        if (context.function) error.context.function = context.function;
        if (context.extra) error.setExtra(context.extra);
      }
      return error;
    }

    if (error instanceof Error) {
      return new TradingError({
        code,
        message: error.message,
        context,
        cause: error,
      });
    }

    return new TradingError({
      code,
      message: String(error),
      context,
    });
  }
}

export function compareSeverity(a: ErrorSeverity, b: ErrorSeverity): number {
  return SEVERITY_ORDER.indexOf(a) - SEVERITY_ORDER.indexOf(b);
}
