// ============================================================
// Signal Generator
// ============================================================
// Strategies whose regimes are active compete; the one with the best
// confluence wins. Equal confluence falls back to the priority of the
// matched regimes, then to the strategy id. Candidates tied on both
// confluence and priority that disagree on direction give a flat signal.
// ============================================================

import type { Bar, IndicatorSnapshot } from '../indicators/types'
import { loggers } from '../logger'
import { collectIndicatorIds, evaluateCondition, isSatisfied } from '../regime/evaluator'
import { compareIds } from '../regime/detector'
import type { ActiveRegimeSet, EvaluationIssue } from '../regime/types'
import type { TelemetrySink } from '../telemetry'
import type {
  Confirmation,
  FlatReason,
  SignalCandidate,
  StrategyConfig,
  StrategyDefinition,
  StrengthSpec,
  TradeDirection,
  TradeSignal,
} from './types'

const logger = loggers.signal

/** Strength used when a strategy defines no strength spec */
export const DEFAULT_STRENGTH = 0.5

export interface SignalContext {
  symbol: string
  telemetry?: TelemetrySink
}

type IssueReporter = (strategyId: string, part: string, issues: EvaluationIssue[]) => void

function clamp01(value: number): number {
  if (value <= 0) return 0
  if (value >= 1) return 1
  return value
}

/**
 * Weighted share of confirmations that hold. 1 when there are none.
 */
export function computeConfluence(
  confirmations: readonly Confirmation[],
  snapshot: IndicatorSnapshot,
  onIssues?: (confirmationId: string, issues: EvaluationIssue[]) => void,
): number {
  if (confirmations.length === 0) return 1

  let total = 0
  let agreeing = 0
  for (const c of confirmations) {
    const weight = c.weight ?? 1
    total += weight
    const evaluation = evaluateCondition(c.condition, snapshot)
    if (evaluation.issues.length > 0) onIssues?.(c.id, evaluation.issues)
    if (isSatisfied(evaluation)) agreeing += weight
  }

  return total > 0 ? clamp01(agreeing / total) : 0
}

/**
 * Distance past the threshold on the favourable side, over `range`.
 * Long reads above the threshold, short below; a missing value is 0.
 */
export function computeStrength(
  spec: StrengthSpec | undefined,
  direction: TradeDirection,
  snapshot: IndicatorSnapshot,
): number {
  if (!spec) return DEFAULT_STRENGTH

  const value = snapshot[spec.indicatorId]?.[spec.field]
  if (value === null || value === undefined || spec.range <= 0) return 0

  const distance = direction === 'long' ? value - spec.threshold : spec.threshold - value
  return clamp01(distance / spec.range)
}

/**
 * Candidate for one strategy, or null when its regimes are inactive,
 * its entry does not hold or its confluence is below minConfluence
 */
export function evaluateStrategy(
  strategy: StrategyDefinition,
  snapshot: IndicatorSnapshot,
  activeRegimes: ActiveRegimeSet,
  regimePriority: ReadonlyMap<string, number>,
  report?: IssueReporter,
): SignalCandidate | null {
  const matched = strategy.regimeIds.filter((id) => activeRegimes.has(id))
  if (matched.length === 0) return null

  const entry = evaluateCondition(strategy.entry, snapshot)
  if (entry.issues.length > 0) report?.(strategy.id, 'entry', entry.issues)
  if (!isSatisfied(entry)) return null

  const confluenceScore = computeConfluence(strategy.confirmations ?? [], snapshot, (id, issues) =>
    report?.(strategy.id, `confirmation ${id}`, issues),
  )
  if (confluenceScore < (strategy.minConfluence ?? 0)) return null

  const priority = Math.max(...matched.map((id) => regimePriority.get(id) ?? 0))

  return {
    strategyId: strategy.id,
    direction: strategy.direction,
    confluenceScore,
    strength: computeStrength(strategy.strength, strategy.direction, snapshot),
    regimeIds: matched,
    priority,
  }
}

/** Best first: confluence, then regime priority, then strategy id */
export function compareCandidates(a: SignalCandidate, b: SignalCandidate): number {
  return (
    b.confluenceScore - a.confluenceScore ||
    b.priority - a.priority ||
    compareIds(a.strategyId, b.strategyId)
  )
}

function flatSignal(symbol: string, timestamp: number, reason: FlatReason, regimeIds: string[]): TradeSignal {
  return Object.freeze({
    symbol,
    direction: 'flat' as const,
    strength: 0,
    confluenceScore: 0,
    regimeIds: Object.freeze(regimeIds),
    strategyId: null,
    timestamp,
    reason,
  })
}

/**
 * One signal for the latest bar. Never throws for missing indicator
 * values; they make conditions unknown, which never triggers an entry.
 */
export function generateSignal(
  bars: readonly Bar[],
  snapshot: IndicatorSnapshot,
  activeRegimes: ActiveRegimeSet,
  strategyConfig: StrategyConfig,
  context: SignalContext,
): TradeSignal {
  const timestamp = bars.length > 0 ? bars[bars.length - 1].timestamp : Date.now()
  const { symbol, telemetry } = context

  const regimePriority = new Map<string, number>()
  for (const regime of strategyConfig.regimes) {
    regimePriority.set(regime.id, regime.priority ?? 0)
  }
  const activeIds = [...activeRegimes].sort(
    (a, b) => (regimePriority.get(b) ?? 0) - (regimePriority.get(a) ?? 0) || compareIds(a, b),
  )

  if (activeIds.length === 0) {
    return flatSignal(symbol, timestamp, 'no_active_regime', [])
  }

  const report: IssueReporter = (strategyId, part, issues) => {
    for (const issue of issues) {
      logger.warn(`Strategy "${strategyId}" ${part} ${issue.kind} at ${issue.path}: ${issue.message}`)
      telemetry?.({
        stage: 'signal',
        reason: issue.kind,
        symbol,
        timestamp,
        detail: { strategyId, part, path: issue.path, message: issue.message },
      })
    }
  }

  const candidates: SignalCandidate[] = []
  for (const strategy of strategyConfig.strategies) {
    const candidate = evaluateStrategy(strategy, snapshot, activeRegimes, regimePriority, report)
    if (candidate) candidates.push(candidate)
  }

  if (candidates.length === 0) {
    return flatSignal(symbol, timestamp, 'no_setup', activeIds)
  }

  candidates.sort(compareCandidates)
  const best = candidates[0]

  const contested = candidates.some(
    (c) =>
      c.direction !== best.direction &&
      c.confluenceScore === best.confluenceScore &&
      c.priority === best.priority,
  )
  if (contested) {
    logger.info(`${symbol}: tied candidates disagree on direction, staying flat`)
    telemetry?.({
      stage: 'signal',
      reason: 'conflict',
      symbol,
      timestamp,
      detail: { strategies: candidates.map((c) => `${c.strategyId}:${c.direction}`) },
    })
    return flatSignal(symbol, timestamp, 'conflict', activeIds)
  }

  logger.signal(
    `${symbol} ${best.direction.toUpperCase()} via ${best.strategyId} ` +
      `(confluence ${best.confluenceScore.toFixed(2)}, strength ${best.strength.toFixed(2)})`,
  )

  return Object.freeze({
    symbol,
    direction: best.direction,
    strength: best.strength,
    confluenceScore: best.confluenceScore,
    regimeIds: Object.freeze([...best.regimeIds]),
    strategyId: best.strategyId,
    timestamp,
  })
}

/**
 * Indicator ids a strategy reads, for building its snapshot
 */
export function strategyIndicatorIds(strategy: StrategyDefinition): string[] {
  const ids: string[] = []
  collectIndicatorIds(strategy.entry, ids)
  for (const c of strategy.confirmations ?? []) collectIndicatorIds(c.condition, ids)
  if (strategy.strength && !ids.includes(strategy.strength.indicatorId)) ids.push(strategy.strength.indicatorId)
  return ids
}
