// ============================================================
// Synthetic Bar Generator
// ============================================================
// Seeded random walk for paper trading and tests. The same seed always
// produces the same bars.
// ============================================================

import type { Bar } from '../indicators/types'

export interface BarGeneratorConfig {
  startPrice: number
  /** per-bar volatility as a fraction of price */
  volatility: number
  /** per-bar drift as a fraction of price */
  trend: number
  intervalMs: number
  count: number
  startTime: number
  seed: number
}

const DEFAULT_CONFIG: BarGeneratorConfig = {
  startPrice: 100,
  volatility: 0.002,
  trend: 0,
  intervalMs: 60_000,
  count: 200,
  startTime: Date.UTC(2024, 0, 1),
  seed: 42,
}

/**
 * Park-Miller LCG, returns values in [0, 1)
 */
export function createRandom(seed: number): () => number {
  let state = Math.floor(Math.abs(seed)) % 2147483647 || 1
  return () => {
    state = (state * 16807) % 2147483647
    return (state - 1) / 2147483646
  }
}

export function generateBars(config: Partial<BarGeneratorConfig> = {}): Bar[] {
  const cfg = { ...DEFAULT_CONFIG, ...config }
  const random = createRandom(cfg.seed)
  const bars: Bar[] = []

  let price = cfg.startPrice
  let timestamp = cfg.startTime

  for (let i = 0; i < cfg.count; i++) {
    const change = (random() - 0.5) * 2 * cfg.volatility + cfg.trend
    const open = price
    const close = price * (1 + change)
    const high = Math.max(open, close) * (1 + random() * cfg.volatility * 0.5)
    const low = Math.min(open, close) * (1 - random() * cfg.volatility * 0.5)
    const volume = 1000 + Math.round(random() * 9000)

    bars.push({ timestamp, open, high, low, close, volume })

    price = close
    timestamp += cfg.intervalMs
  }

  return bars
}

export interface LinearBarsOptions {
  start?: number
  step?: number
  /** distance of high/low from close */
  spread?: number
  intervalMs?: number
  startTime?: number
  volume?: number
}

/**
 * Bars whose close moves by a fixed step every bar
 */
export function generateLinearBars(count: number, options: LinearBarsOptions = {}): Bar[] {
  const {
    start = 100,
    step = 1,
    spread = 0.5,
    intervalMs = 60_000,
    startTime = Date.UTC(2024, 0, 1),
    volume = 1000,
  } = options

  const bars: Bar[] = []
  for (let i = 0; i < count; i++) {
    const close = start + step * i
    bars.push({
      timestamp: startTime + i * intervalMs,
      open: close - step,
      high: close + spread,
      low: close - spread,
      close,
      volume,
    })
  }
  return bars
}
