// ============================================================
// Signal Types
// ============================================================

import type { ConditionNode, RegimeDefinition } from '../regime/types'

export type TradeDirection = 'long' | 'short'
export type SignalDirection = TradeDirection | 'flat'

/** Why a signal came out flat */
export type FlatReason = 'no_active_regime' | 'no_setup' | 'conflict'

/**
 * Independent condition that adds to a strategy's confluence when true
 */
export interface Confirmation {
  id: string
  /** default 1 */
  weight?: number
  condition: ConditionNode
}

/**
 * Strength = distance of an indicator past `threshold`, scaled by `range`
 * and clamped to [0, 1]
 */
export interface StrengthSpec {
  indicatorId: string
  field: string
  threshold: number
  range: number
}

export interface StrategyDefinition {
  id: string
  name?: string
  /** strategy is a candidate while any of these regimes is active */
  regimeIds: string[]
  direction: TradeDirection
  entry: ConditionNode
  confirmations?: Confirmation[]
  strength?: StrengthSpec
  /** candidates below this confluence are dropped; default 0 */
  minConfluence?: number
}

export interface StrategyConfig {
  strategies: readonly StrategyDefinition[]
  /** used for regime priority in the tie-break */
  regimes: readonly RegimeDefinition[]
}

export interface TradeSignal {
  readonly symbol: string
  readonly direction: SignalDirection
  /** [0, 1] */
  readonly strength: number
  /** [0, 1] */
  readonly confluenceScore: number
  /** active regimes that made the winning strategy a candidate */
  readonly regimeIds: readonly string[]
  readonly strategyId: string | null
  /** timestamp of the last bar */
  readonly timestamp: number
  readonly reason?: string
}

export interface SignalCandidate {
  strategyId: string
  direction: TradeDirection
  confluenceScore: number
  strength: number
  regimeIds: string[]
  /** best priority among the matched regimes */
  priority: number
}
