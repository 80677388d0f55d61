// ============================================================
// Bar Resampling
// ============================================================
// Folds bars into a coarser timeframe. Buckets start at whole multiples
// of the period since the epoch; the newest bucket may still be forming.
// ============================================================

import { TradingError, ErrorCode } from '../errors';
import { timeframeToMs } from '../market/types';
import type { Bar } from './types';

export function resampleBars(bars: readonly Bar[], periodMs: number): Bar[] {
  const out: Bar[] = [];
  for (const bar of bars) {
    const start = Math.floor(bar.timestamp / periodMs) * periodMs;
    const last = out[out.length - 1];
    if (last && last.timestamp === start) {
      last.high = Math.max(last.high, bar.high);
      last.low = Math.min(last.low, bar.low);
      last.close = bar.close;
      last.volume += bar.volume;
    } else {
      out.push({ ...bar, timestamp: start });
    }
  }
  return out;
}

function unreadable(timeframe: string): TradingError {
  return new TradingError({
    code: ErrorCode.STRATEGY_INVALID_CONFIG,
    message: `Unreadable timeframe "${timeframe}"`,
    context: { module: 'lib/indicators', function: 'resamplePeriod', extra: { timeframe } },
  });
}

/**
 * Period in ms for resampling `source` bars up to `target`.
 * The target must be a whole multiple of the source.
 */
export function resamplePeriod(target: string, source?: string): number {
  const targetMs = timeframeToMs(target);
  if (targetMs === null) throw unreadable(target);
  if (source === undefined) return targetMs;

  const sourceMs = timeframeToMs(source);
  if (sourceMs === null) throw unreadable(source);
  if (targetMs < sourceMs || targetMs % sourceMs !== 0) {
    throw new TradingError({
      code: ErrorCode.STRATEGY_INVALID_CONFIG,
      message: `Cannot build ${target} bars from ${source} bars`,
      context: { module: 'lib/indicators', function: 'resamplePeriod', extra: { target, source } },
    });
  }
  return targetMs;
}
