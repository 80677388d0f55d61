// ============================================================
// Market Data Interfaces
// ============================================================
// Broker-specific feeds implement IMarketDataSource; the analysis cycle
// only sees this contract.
// ============================================================

import type { Bar } from '../indicators/types'

export type Unsubscribe = () => void

/** Candle period label, e.g. '1m', '5m', '1h' */
export type Timeframe = string

const TIMEFRAME_UNITS: Record<string, number> = {
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
}

/**
 * '5m' -> 300000. Returns null for labels it cannot read.
 */
export function timeframeToMs(timeframe: Timeframe): number | null {
  const match = /^(\d+)([smhd])$/.exec(timeframe)
  if (!match) return null
  const count = Number(match[1])
  const unit = TIMEFRAME_UNITS[match[2]]
  return count > 0 && unit ? count * unit : null
}

export interface IMarketDataSource {
  readonly name: string
  /** Most recent closed bars, oldest first */
  fetchBars(symbol: string, timeframe: Timeframe, limit: number): Promise<Bar[]>
}
