// ============================================================
// Technical Indicator Types
// ============================================================

/**
 * One closed OHLCV sample
 */
export interface Bar {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type IndicatorType =
  | 'sma'
  | 'ema'
  | 'rsi'
  | 'macd'
  | 'bb'
  | 'stoch'
  | 'atr'
  | 'adx'
  | 'cci'
  | 'willr'
  | 'vwap'
  | 'chop'
  | 'volume_ratio'
  | 'price_change'
  | 'price';

export type IndicatorParams = Readonly<Record<string, number>>;

/**
 * Output field names per indicator type.
 * Callers reference these in conditions without running a calculation.
 */
export const INDICATOR_FIELDS = {
  sma: ['value'],
  ema: ['value'],
  rsi: ['value'],
  macd: ['macd', 'signal', 'histogram'],
  bb: ['upper', 'middle', 'lower', 'width', 'percent_b'],
  stoch: ['k', 'd'],
  atr: ['value'],
  adx: ['value', 'plus_di', 'minus_di'],
  cci: ['value'],
  willr: ['value'],
  vwap: ['value'],
  chop: ['value'],
  volume_ratio: ['value'],
  price_change: ['value'],
  price: ['open', 'high', 'low', 'close', 'volume'],
} as const satisfies Record<IndicatorType, readonly string[]>;

export const DEFAULT_PARAMS: Record<IndicatorType, IndicatorParams> = {
  sma: { period: 20 },
  ema: { period: 20 },
  rsi: { period: 14 },
  macd: { fast: 12, slow: 26, signal: 9 },
  bb: { period: 20, stdDev: 2 },
  stoch: { kPeriod: 14, dPeriod: 3 },
  atr: { period: 14 },
  adx: { period: 14 },
  cci: { period: 20 },
  willr: { period: 14 },
  vwap: {},
  chop: { period: 14 },
  volume_ratio: { period: 20 },
  price_change: { period: 1 },
  price: {},
};

export function isIndicatorType(value: unknown): value is IndicatorType {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(INDICATOR_FIELDS, value);
}

export interface IndicatorConfig {
  indicatorType: IndicatorType;
  params?: IndicatorParams;
  /** memoize when a cache context is given (default true) */
  cacheResults?: boolean;
}

/**
 * Series aligned to the input bars; null before the indicator's lookback
 */
export type IndicatorSeries = readonly (number | null)[];

export interface IndicatorResult {
  readonly indicatorType: IndicatorType;
  /** resolved params, defaults included */
  readonly params: IndicatorParams;
  readonly length: number;
  readonly fields: Readonly<Record<string, IndicatorSeries>>;
}

/**
 * Identifies the market a calculation belongs to, for caching
 */
export interface CacheContext {
  symbol: string;
  timeframe: string;
}

/**
 * Named indicator instance referenced by conditions
 */
export interface IndicatorDefinition {
  id: string;
  type: IndicatorType;
  params?: IndicatorParams;
  timeframe?: string;
}

/**
 * Latest value of every field of every indicator: snapshot[id][field]
 */
export type IndicatorSnapshot = Readonly<Record<string, Readonly<Record<string, number | null>>>>;
