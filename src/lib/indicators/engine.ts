// ============================================================
// Indicator Engine
// ============================================================
// calculate(bars, config) -> per-bar named fields. Missing values are
// null for every indicator type; nothing here throws for short input.
// ============================================================

import { TradingError, ErrorCode } from '../errors';
import { loggers } from '../logger';
import { IndicatorResultCache, buildCacheKey, DEFAULT_CACHE_SIZE } from './cache';
import type { CacheStats } from './cache';
import { resampleBars, resamplePeriod } from './resample';
import {
  DEFAULT_PARAMS,
  INDICATOR_FIELDS,
  isIndicatorType,
} from './types';
import type {
  Bar,
  CacheContext,
  IndicatorConfig,
  IndicatorDefinition,
  IndicatorParams,
  IndicatorResult,
  IndicatorSeries,
  IndicatorSnapshot,
  IndicatorType,
} from './types';
import {
  adxSeries,
  atrSeries,
  bollingerSeries,
  cciSeries,
  choppinessSeries,
  emaSeries,
  macdSeries,
  priceChangeSeries,
  rsiSeries,
  smaSeries,
  stochasticSeries,
  volumeRatioSeries,
  vwapSeries,
  williamsRSeries,
} from './series';

const logger = loggers.indicators;

export interface SnapshotFailure {
  indicatorId: string;
  error: TradingError;
}

export interface SnapshotBuild {
  snapshot: IndicatorSnapshot;
  failures: SnapshotFailure[];
}

function invalidParams(type: IndicatorType, message: string): TradingError {
  return new TradingError({
    code: ErrorCode.STRATEGY_INVALID_CONFIG,
    message: `${type}: ${message}`,
    context: { module: 'lib/indicators', function: 'resolveParams', extra: { type } },
  });
}

/**
 * Merge defaults and validate. Periods must be positive integers,
 * stdDev a positive number, and no unknown keys are accepted.
 */
export function resolveParams(type: IndicatorType, params: IndicatorParams = {}): IndicatorParams {
  const defaults = DEFAULT_PARAMS[type];
  const resolved: Record<string, number> = { ...defaults };

  for (const [key, value] of Object.entries(params)) {
    if (!(key in defaults)) {
      throw invalidParams(type, `unknown param "${key}"`);
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      throw invalidParams(type, `param "${key}" must be a positive number`);
    }
    if (key !== 'stdDev' && !Number.isInteger(value)) {
      throw invalidParams(type, `param "${key}" must be an integer`);
    }
    resolved[key] = value;
  }

  if (type === 'macd' && resolved.fast >= resolved.slow) {
    throw invalidParams(type, 'fast period must be shorter than slow period');
  }
  // log10(period) is the divisor
  if (type === 'chop' && resolved.period < 2) {
    throw invalidParams(type, 'period must be at least 2');
  }

  return resolved;
}

/**
 * Bars needed before the latest value of every field is defined
 */
export function minBarsFor(type: IndicatorType, params: IndicatorParams = {}): number {
  const p = resolveParams(type, params);
  switch (type) {
    case 'sma':
    case 'ema':
    case 'bb':
    case 'cci':
    case 'willr':
    case 'volume_ratio':
      return p.period;
    case 'rsi':
    case 'atr':
    case 'chop':
    case 'price_change':
      return p.period + 1;
    case 'macd':
      return p.slow + p.signal;
    case 'stoch':
      return p.kPeriod + p.dPeriod - 1;
    case 'adx':
      return p.period * 2;
    case 'vwap':
    case 'price':
      return 1;
  }
}

function computeFields(
  type: IndicatorType,
  p: IndicatorParams,
  bars: readonly Bar[],
): Record<string, IndicatorSeries> {
  const opens = bars.map((b) => b.open);
  const highs = bars.map((b) => b.high);
  const lows = bars.map((b) => b.low);
  const closes = bars.map((b) => b.close);
  const volumes = bars.map((b) => b.volume);

  switch (type) {
    case 'sma':
      return { value: smaSeries(closes, p.period) };
    case 'ema':
      return { value: emaSeries(closes, p.period) };
    case 'rsi':
      return { value: rsiSeries(closes, p.period) };
    case 'macd':
      return { ...macdSeries(closes, p.fast, p.slow, p.signal) };
    case 'bb':
      return { ...bollingerSeries(closes, p.period, p.stdDev) };
    case 'stoch':
      return { ...stochasticSeries(highs, lows, closes, p.kPeriod, p.dPeriod) };
    case 'atr':
      return { value: atrSeries(highs, lows, closes, p.period) };
    case 'adx':
      return { ...adxSeries(highs, lows, closes, p.period) };
    case 'cci':
      return { value: cciSeries(highs, lows, closes, p.period) };
    case 'willr':
      return { value: williamsRSeries(highs, lows, closes, p.period) };
    case 'vwap':
      return { value: vwapSeries(highs, lows, closes, volumes) };
    case 'chop':
      return { value: choppinessSeries(highs, lows, closes, p.period) };
    case 'volume_ratio':
      return { value: volumeRatioSeries(volumes, p.period) };
    case 'price_change':
      return { value: priceChangeSeries(closes, p.period) };
    case 'price':
      return { open: opens, high: highs, low: lows, close: closes, volume: volumes };
  }
}

/**
 * Latest value of a series, null when empty or undefined at the last bar
 */
export function latestValue(series: IndicatorSeries | undefined): number | null {
  if (!series || series.length === 0) return null;
  return series[series.length - 1];
}

/**
 * Latest value of a field, for callers that cannot work with a missing value
 */
export function requireLatest(result: IndicatorResult, field: string): number {
  const value = latestValue(result.fields[field]);
  if (value === null) {
    throw new TradingError({
      code: ErrorCode.INDICATOR_INSUFFICIENT_DATA,
      message: `${result.indicatorType}.${field} undefined after ${result.length} bars`,
      context: {
        module: 'lib/indicators',
        function: 'requireLatest',
        extra: { required: minBarsFor(result.indicatorType, result.params) },
      },
    });
  }
  return value;
}

export class IndicatorEngine {
  private cache: IndicatorResultCache;

  constructor(cacheSize: number = DEFAULT_CACHE_SIZE) {
    this.cache = new IndicatorResultCache(cacheSize);
  }

  /**
   * Compute one indicator over `bars`.
   * With a cache context and cacheResults (default true) the result is
   * memoized until a different last bar arrives for the same key.
   */
  calculate(bars: readonly Bar[], config: IndicatorConfig, context?: CacheContext): IndicatorResult {
    const type: unknown = config.indicatorType;
    if (!isIndicatorType(type)) {
      throw new TradingError({
        code: ErrorCode.INDICATOR_UNKNOWN_TYPE,
        message: `Unknown indicator type: ${String(type)}`,
        context: { module: 'lib/indicators', function: 'calculate' },
      });
    }

    const params = resolveParams(type, config.params);
    const useCache = context !== undefined && config.cacheResults !== false && bars.length > 0;
    const lastTimestamp = bars.length > 0 ? bars[bars.length - 1].timestamp : 0;
    const key = context ? buildCacheKey(context, type, params) : '';

    if (useCache) {
      const cached = this.cache.get(key, lastTimestamp, bars.length);
      if (cached) return cached;
    }

    const fields = computeFields(type, params, bars);
    for (const name of Object.keys(fields)) {
      Object.freeze(fields[name]);
    }

    const result: IndicatorResult = Object.freeze({
      indicatorType: type,
      params,
      length: bars.length,
      fields: Object.freeze(fields),
    });

    if (useCache) {
      this.cache.set(key, lastTimestamp, bars.length, result);
    }

    return result;
  }

  /**
   * Latest value of every field of every definition.
   * A failing definition is left out and reported; the others still compute.
   * A definition on a coarser timeframe than `context` reads resampled bars
   * and is not cached: its forming bucket changes without a new last bar.
   */
  buildSnapshot(
    bars: readonly Bar[],
    definitions: readonly IndicatorDefinition[],
    context?: CacheContext,
  ): SnapshotBuild {
    const snapshot: Record<string, Record<string, number | null>> = {};
    const failures: SnapshotFailure[] = [];

    for (const def of definitions) {
      try {
        let input = bars;
        let cacheResults = true;
        if (def.timeframe !== undefined && def.timeframe !== context?.timeframe) {
          input = resampleBars(bars, resamplePeriod(def.timeframe, context?.timeframe));
          cacheResults = false;
        }
        const result = this.calculate(
          input,
          { indicatorType: def.type, params: def.params, cacheResults },
          context,
        );

        const latest: Record<string, number | null> = {};
        for (const field of INDICATOR_FIELDS[result.indicatorType]) {
          latest[field] = latestValue(result.fields[field]);
        }
        snapshot[def.id] = latest;
      } catch (e) {
        const error = TradingError.from(
          e,
          { module: 'lib/indicators', function: 'buildSnapshot', extra: { indicatorId: def.id } },
          ErrorCode.INDICATOR_CALCULATION_FAILED,
        );
        logger.warn(`Indicator "${def.id}" skipped: ${error.message}`);
        failures.push({ indicatorId: def.id, error });
      }
    }

    return { snapshot, failures };
  }

  clearCache(): void {
    this.cache.clear();
    logger.debug('Indicator cache cleared');
  }

  getCacheStats(): CacheStats {
    return this.cache.getStats();
  }
}
