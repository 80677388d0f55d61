// ============================================================
// Order Request Validation
// ============================================================
// Structural check of an order before it enters the gate chain.
// Rejects NaN, non-finite, non-positive and out-of-range quantities,
// unknown sides/types and limit orders without a price.
// ============================================================

import { TradingError, ErrorCode, ErrorSeverity } from '../errors';
import type { ErrorContext } from '../errors';
import type { OrderRequest } from './types';

export interface QuantityValidationConfig {
  /** smallest accepted quantity (default: 0.00000001) */
  minQuantity: number;
  /** largest accepted quantity (default: 1000000) */
  maxQuantity: number;
  /** decimal places kept after rounding (default: 8) */
  maxDecimalPlaces: number;
}

export const DEFAULT_QUANTITY_VALIDATION: QuantityValidationConfig = {
  minQuantity: 0.00000001,
  maxQuantity: 1_000_000,
  maxDecimalPlaces: 8,
};

export interface QuantityValidationResult {
  valid: boolean;
  /** rounded quantity when valid */
  normalizedQuantity?: number;
  reason?: string;
  errorCode?: ErrorCode;
}

export interface OrderValidationResult {
  valid: boolean;
  order?: OrderRequest;
  reason?: string;
  errorCode?: ErrorCode;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Validate and normalize an order quantity.
 *
 * Checks, in order: presence, number type, NaN, finiteness, > 0,
 * minimum, maximum. The accepted value is rounded to maxDecimalPlaces.
 */
export function validateQuantity(
  quantity: unknown,
  config: Partial<QuantityValidationConfig> = {},
): QuantityValidationResult {
  const cfg: QuantityValidationConfig = { ...DEFAULT_QUANTITY_VALIDATION, ...config };

  if (quantity === undefined || quantity === null) {
    return {
      valid: false,
      reason: 'Quantity is missing (undefined/null)',
      errorCode: ErrorCode.VALIDATION_REQUIRED,
    };
  }

  if (typeof quantity !== 'number') {
    return {
      valid: false,
      reason: `Quantity is not a number (type: ${typeof quantity}, value: ${String(quantity)})`,
      errorCode: ErrorCode.VALIDATION_TYPE,
    };
  }

  if (Number.isNaN(quantity)) {
    return { valid: false, reason: 'Quantity is NaN', errorCode: ErrorCode.VALIDATION_TYPE };
  }

  if (!Number.isFinite(quantity)) {
    return {
      valid: false,
      reason: `Quantity is not finite (value: ${quantity})`,
      errorCode: ErrorCode.VALIDATION_TYPE,
    };
  }

  if (quantity <= 0) {
    return {
      valid: false,
      reason: `Quantity must be greater than 0 (value: ${quantity})`,
      errorCode: ErrorCode.VALIDATION_RANGE,
    };
  }

  if (quantity < cfg.minQuantity) {
    return {
      valid: false,
      reason: `Quantity is below the minimum ${cfg.minQuantity} (value: ${quantity})`,
      errorCode: ErrorCode.VALIDATION_RANGE,
    };
  }

  if (quantity > cfg.maxQuantity) {
    return {
      valid: false,
      reason: `Quantity exceeds the maximum ${cfg.maxQuantity} (value: ${quantity})`,
      errorCode: ErrorCode.VALIDATION_RANGE,
    };
  }

  return { valid: true, normalizedQuantity: roundTo(quantity, cfg.maxDecimalPlaces) };
}

/**
 * Validate the whole order shape and return a normalized copy
 */
export function validateOrderRequest(
  order: unknown,
  config: Partial<QuantityValidationConfig> = {},
): OrderValidationResult {
  if (!isRecord(order)) {
    return { valid: false, reason: 'Order must be an object', errorCode: ErrorCode.VALIDATION_TYPE };
  }

  const { symbol, side, quantity, orderType, price } = order;

  if (typeof symbol !== 'string' || symbol.trim() === '') {
    return { valid: false, reason: 'Order symbol is required', errorCode: ErrorCode.VALIDATION_REQUIRED };
  }

  if (side !== 'buy' && side !== 'sell') {
    return {
      valid: false,
      reason: `Order side must be buy or sell (value: ${String(side)})`,
      errorCode: ErrorCode.VALIDATION_FORMAT,
    };
  }

  const type = orderType ?? 'market';
  if (type !== 'market' && type !== 'limit') {
    return {
      valid: false,
      reason: `Order type must be market or limit (value: ${String(type)})`,
      errorCode: ErrorCode.VALIDATION_FORMAT,
    };
  }

  const qty = validateQuantity(quantity, config);
  if (!qty.valid || qty.normalizedQuantity === undefined) {
    return { valid: false, reason: qty.reason, errorCode: qty.errorCode };
  }

  if (price !== undefined && (typeof price !== 'number' || !Number.isFinite(price) || price <= 0)) {
    return {
      valid: false,
      reason: `Order price must be a positive number (value: ${String(price)})`,
      errorCode: ErrorCode.VALIDATION_RANGE,
    };
  }

  if (type === 'limit' && price === undefined) {
    return { valid: false, reason: 'Limit order needs a price', errorCode: ErrorCode.VALIDATION_REQUIRED };
  }

  const normalized: OrderRequest = {
    symbol: symbol.trim(),
    side,
    quantity: qty.normalizedQuantity,
    orderType: type,
  };
  if (typeof price === 'number') normalized.price = price;

  return { valid: true, order: normalized };
}

/**
 * Validate a quantity and throw a TradingError when it fails.
 * Used by the order builder, where a bad size is a configuration error.
 */
export function assertValidQuantity(
  quantity: unknown,
  context: Pick<ErrorContext, 'module' | 'function'>,
  config: Partial<QuantityValidationConfig> = {},
): number {
  const result = validateQuantity(quantity, config);

  if (!result.valid || result.normalizedQuantity === undefined) {
    throw new TradingError({
      code: result.errorCode ?? ErrorCode.VALIDATION_RANGE,
      message: result.reason ?? 'Quantity validation failed',
      context: { ...context, extra: { quantity, validationConfig: config } },
      severity: ErrorSeverity.ERROR,
    });
  }

  return result.normalizedQuantity;
}
