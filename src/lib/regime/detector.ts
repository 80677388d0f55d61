// ============================================================
// Regime Detector
// ============================================================
// Evaluates every regime of the requested scope against one snapshot.
// Regimes are independent: an issue or a throw in one regime is
// reported and that regime counts as inactive, nothing more.
// ============================================================

import type { IndicatorSnapshot } from '../indicators/types'
import { loggers } from '../logger'
import type { TelemetrySink } from '../telemetry'
import { evaluateCondition } from './evaluator'
import type {
  ActiveRegimeSet,
  EvaluationIssue,
  RegimeDefinition,
  RegimeScope,
  TriState,
} from './types'

const logger = loggers.regime

export interface DetectOptions {
  symbol?: string
  /** stamped on telemetry events; defaults to Date.now() */
  timestamp?: number
  telemetry?: TelemetrySink
}

export interface RegimeEvaluation {
  regimeId: string
  value: TriState
  active: boolean
  issues: EvaluationIssue[]
}

/**
 * Evaluate each matching-scope regime and report its issues
 */
export function evaluateRegimes(
  snapshot: IndicatorSnapshot,
  regimes: readonly RegimeDefinition[],
  scope: RegimeScope,
  options: DetectOptions = {},
): RegimeEvaluation[] {
  const timestamp = options.timestamp ?? Date.now()
  const results: RegimeEvaluation[] = []

  for (const regime of regimes) {
    if (regime.scope !== scope) continue

    let evaluation: RegimeEvaluation
    try {
      const { value, issues } = evaluateCondition(regime.conditions, snapshot)
      evaluation = { regimeId: regime.id, value, active: value === true, issues }
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e)
      evaluation = {
        regimeId: regime.id,
        value: 'unknown',
        active: false,
        issues: [{ kind: 'malformed', path: '$', message: `evaluation failed: ${message}` }],
      }
    }

    for (const issue of evaluation.issues) {
      logger.warn(`Regime "${regime.id}" ${issue.kind} at ${issue.path}: ${issue.message}`)
      options.telemetry?.({
        stage: 'regime',
        reason: issue.kind,
        symbol: options.symbol,
        timestamp,
        detail: { regimeId: regime.id, path: issue.path, message: issue.message },
      })
    }

    results.push(evaluation)
  }

  return results
}

/**
 * Ids of the regimes whose tree is definitely true. No order is implied;
 * use rankActiveRegimes when one winner is needed.
 */
export function detectActiveRegimes(
  snapshot: IndicatorSnapshot,
  regimes: readonly RegimeDefinition[],
  scope: RegimeScope,
  options: DetectOptions = {},
): ActiveRegimeSet {
  const active = new Set<string>()
  for (const evaluation of evaluateRegimes(snapshot, regimes, scope, options)) {
    if (evaluation.active) active.add(evaluation.regimeId)
  }
  if (active.size > 0) {
    logger.debug(`Active ${scope} regimes: ${[...active].join(', ')}`)
  }
  return active
}

/**
 * Active regime definitions, highest priority first, then by id
 */
export function rankActiveRegimes(
  active: ActiveRegimeSet,
  regimes: readonly RegimeDefinition[],
): RegimeDefinition[] {
  return regimes
    .filter((r) => active.has(r.id))
    .sort((a, b) => (b.priority ?? 0) - (a.priority ?? 0) || compareIds(a.id, b.id))
}

/** Code-unit order, independent of locale */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}
