import { TradingError } from './trading-error';
import { ErrorCode } from './error-codes';
import type { ErrorContext } from './trading-error';

export interface Success<T> {
  readonly success: true;
  readonly data: T;
}

export interface Failure<E = TradingError> {
  readonly success: false;
  readonly error: E;
}

/**
 * Result type - success or failure made explicit
 *
 * @example
 * ```typescript
 * const parsed = parseStrategyDocument(raw);
 * if (parsed.success) {
 *   run(parsed.data);
 * } else {
 *   logger.error(parsed.error.toShortString());
 * }
 * ```
 */
export type Result<T, E = TradingError> = Success<T> | Failure<E>;

export const Result = {
  ok: <T>(data: T): Success<T> => ({ success: true, data }),

  err: <E = TradingError>(error: E): Failure<E> => ({ success: false, error }),

  /**
   * Failure carrying a fresh TradingError
   */
  fail: (
    code: ErrorCode,
    message: string,
    context?: Partial<ErrorContext>
  ): Failure<TradingError> =>
    Result.err(new TradingError({ code, message, context })),
};
