// ============================================================
// Signals - strategy evaluation and order sizing
// ============================================================

export {
  generateSignal,
  evaluateStrategy,
  computeConfluence,
  computeStrength,
  compareCandidates,
  strategyIndicatorIds,
  DEFAULT_STRENGTH,
} from './signal-generator'
export type { SignalContext } from './signal-generator'
export { buildExitOrder, buildOrderRequest } from './order-builder'
export type { SizingConfig } from './order-builder'
export type * from './types'
