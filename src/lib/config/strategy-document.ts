// ============================================================
// Strategy Document
// ============================================================
// Indicators, regimes and strategies as one JSON document. Parsing
// checks shapes, unique ids and that every condition only reads declared
// indicators and fields; the first problem found fails the parse and
// the full list travels in the error's extra.errors.
// ============================================================

import { readFile } from 'node:fs/promises'
import { ErrorCode, Result, TradingError } from '../errors'
import { resolveParams } from '../indicators/engine'
import { INDICATOR_FIELDS, isIndicatorType } from '../indicators/types'
import { timeframeToMs } from '../market/types'
import type { IndicatorDefinition, IndicatorSnapshot } from '../indicators/types'
import { checkCondition, isConditionNode, isRecord } from '../regime/evaluator'
import type { ConditionNode, RegimeDefinition } from '../regime/types'
import type { Confirmation, StrategyConfig, StrategyDefinition, StrengthSpec } from '../signals/types'

export const SUPPORTED_SCHEMA_VERSION = 1

export interface StrategyDocument {
  schemaVersion: number
  indicators: IndicatorDefinition[]
  regimes: RegimeDefinition[]
  strategies: StrategyDefinition[]
}

/** Collects problems with their JSON path */
class Problems {
  readonly list: string[] = []

  add(path: string, message: string): void {
    this.list.push(`${path}: ${message}`)
  }

  get ok(): boolean {
    return this.list.length === 0
  }
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== ''
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

function checkUniqueIds(items: readonly { id: string }[], path: string, problems: Problems): void {
  const seen = new Set<string>()
  items.forEach((item, i) => {
    if (seen.has(item.id)) problems.add(`${path}[${i}].id`, `duplicate id "${item.id}"`)
    seen.add(item.id)
  })
}

// ============================================================
// Sections
// ============================================================

function parseIndicators(raw: unknown, problems: Problems): IndicatorDefinition[] {
  if (!Array.isArray(raw)) {
    problems.add('$.indicators', 'must be an array')
    return []
  }

  const out: IndicatorDefinition[] = []
  raw.forEach((item: unknown, i) => {
    const path = `$.indicators[${i}]`
    if (!isRecord(item)) return problems.add(path, 'must be an object')

    const { id, type, params, timeframe } = item
    if (!isNonEmptyString(id)) return problems.add(`${path}.id`, 'must be a non-empty string')
    if (!isIndicatorType(type)) return problems.add(`${path}.type`, `unknown indicator type "${String(type)}"`)
    if (timeframe !== undefined && !isNonEmptyString(timeframe)) {
      return problems.add(`${path}.timeframe`, 'must be a non-empty string')
    }
    if (typeof timeframe === 'string' && timeframeToMs(timeframe) === null) {
      return problems.add(`${path}.timeframe`, `unreadable timeframe "${timeframe}"`)
    }

    const numeric: Record<string, number> = {}
    if (params !== undefined) {
      if (!isRecord(params)) return problems.add(`${path}.params`, 'must be an object')
      for (const [key, value] of Object.entries(params)) {
        if (!isFiniteNumber(value)) return problems.add(`${path}.params.${key}`, 'must be a number')
        numeric[key] = value
      }
    }

    try {
      resolveParams(type, numeric)
    } catch (e) {
      return problems.add(`${path}.params`, e instanceof Error ? e.message : String(e))
    }

    const def: IndicatorDefinition = { id, type, params: numeric }
    if (typeof timeframe === 'string') def.timeframe = timeframe
    out.push(def)
  })

  checkUniqueIds(out, '$.indicators', problems)
  return out
}

/**
 * Every field of every declared indicator, all undefined. A reference
 * that resolves to undefined_operand here names a declared field.
 */
function buildShapeSnapshot(indicators: readonly IndicatorDefinition[]): IndicatorSnapshot {
  const snapshot: Record<string, Record<string, number | null>> = {}
  for (const def of indicators) {
    const fields: Record<string, number | null> = {}
    for (const field of INDICATOR_FIELDS[def.type]) fields[field] = null
    snapshot[def.id] = fields
  }
  return snapshot
}

function parseCondition(raw: unknown, path: string, shape: IndicatorSnapshot, problems: Problems): ConditionNode | null {
  const { issues } = checkCondition(raw, shape)
  let failed = false
  for (const issue of issues) {
    if (issue.kind === 'undefined_operand') continue
    failed = true
    problems.add(path + issue.path.slice(1), issue.message)
  }

  if (failed) return null
  if (!isConditionNode(raw)) {
    problems.add(path, 'not a valid condition tree')
    return null
  }
  return raw
}

function parseRegimes(raw: unknown, shape: IndicatorSnapshot, problems: Problems): RegimeDefinition[] {
  if (!Array.isArray(raw)) {
    problems.add('$.regimes', 'must be an array')
    return []
  }

  const out: RegimeDefinition[] = []
  raw.forEach((item: unknown, i) => {
    const path = `$.regimes[${i}]`
    if (!isRecord(item)) return problems.add(path, 'must be an object')

    const { id, name, scope, priority, conditions } = item
    if (!isNonEmptyString(id)) return problems.add(`${path}.id`, 'must be a non-empty string')
    if (name !== undefined && typeof name !== 'string') return problems.add(`${path}.name`, 'must be a string')
    if (scope !== 'entry' && scope !== 'exit') return problems.add(`${path}.scope`, 'must be "entry" or "exit"')
    if (priority !== undefined && !isFiniteNumber(priority)) return problems.add(`${path}.priority`, 'must be a number')

    const node = parseCondition(conditions, `${path}.conditions`, shape, problems)
    if (!node) return

    const regime: RegimeDefinition = { id, scope, conditions: node }
    if (typeof name === 'string') regime.name = name
    if (isFiniteNumber(priority)) regime.priority = priority
    out.push(regime)
  })

  checkUniqueIds(out, '$.regimes', problems)
  return out
}

function parseStrength(
  raw: unknown,
  path: string,
  indicators: readonly IndicatorDefinition[],
  problems: Problems,
): StrengthSpec | null {
  if (!isRecord(raw)) {
    problems.add(path, 'must be an object')
    return null
  }

  const { indicatorId, field, threshold, range } = raw
  const def = indicators.find((d) => d.id === indicatorId)
  if (!isNonEmptyString(indicatorId) || !def) {
    problems.add(`${path}.indicatorId`, `indicator "${String(indicatorId)}" is not declared`)
    return null
  }
  const fields: readonly string[] = INDICATOR_FIELDS[def.type]
  if (typeof field !== 'string' || !fields.includes(field)) {
    problems.add(`${path}.field`, `${def.type} has no field "${String(field)}"`)
    return null
  }
  if (!isFiniteNumber(threshold)) {
    problems.add(`${path}.threshold`, 'must be a number')
    return null
  }
  if (!isFiniteNumber(range) || range <= 0) {
    problems.add(`${path}.range`, 'must be a positive number')
    return null
  }

  return { indicatorId, field, threshold, range }
}

function parseConfirmations(
  raw: unknown,
  path: string,
  shape: IndicatorSnapshot,
  problems: Problems,
): Confirmation[] {
  if (!Array.isArray(raw)) {
    problems.add(path, 'must be an array')
    return []
  }

  const out: Confirmation[] = []
  raw.forEach((item: unknown, i) => {
    const itemPath = `${path}[${i}]`
    if (!isRecord(item)) return problems.add(itemPath, 'must be an object')

    const { id, weight, condition } = item
    if (!isNonEmptyString(id)) return problems.add(`${itemPath}.id`, 'must be a non-empty string')
    if (weight !== undefined && (!isFiniteNumber(weight) || weight <= 0)) {
      return problems.add(`${itemPath}.weight`, 'must be a positive number')
    }

    const node = parseCondition(condition, `${itemPath}.condition`, shape, problems)
    if (!node) return

    const confirmation: Confirmation = { id, condition: node }
    if (isFiniteNumber(weight)) confirmation.weight = weight
    out.push(confirmation)
  })

  checkUniqueIds(out, path, problems)
  return out
}

function parseStrategies(
  raw: unknown,
  indicators: readonly IndicatorDefinition[],
  regimes: readonly RegimeDefinition[],
  shape: IndicatorSnapshot,
  problems: Problems,
): StrategyDefinition[] {
  if (!Array.isArray(raw)) {
    problems.add('$.strategies', 'must be an array')
    return []
  }

  const regimeIds = new Set(regimes.map((r) => r.id))
  const out: StrategyDefinition[] = []

  raw.forEach((item: unknown, i) => {
    const path = `$.strategies[${i}]`
    if (!isRecord(item)) return problems.add(path, 'must be an object')

    const { id, name, direction, entry, confirmations, strength, minConfluence } = item
    if (!isNonEmptyString(id)) return problems.add(`${path}.id`, 'must be a non-empty string')
    if (name !== undefined && typeof name !== 'string') return problems.add(`${path}.name`, 'must be a string')
    if (direction !== 'long' && direction !== 'short') {
      return problems.add(`${path}.direction`, 'must be "long" or "short"')
    }

    const rawRegimeIds = item.regimeIds
    if (!Array.isArray(rawRegimeIds) || rawRegimeIds.length === 0) {
      return problems.add(`${path}.regimeIds`, 'must be a non-empty array')
    }
    const ids: string[] = []
    const listed: unknown[] = rawRegimeIds
    for (const rid of listed) {
      if (typeof rid !== 'string' || !regimeIds.has(rid)) {
        return problems.add(`${path}.regimeIds`, `regime "${String(rid)}" is not declared`)
      }
      ids.push(rid)
    }

    if (minConfluence !== undefined && (!isFiniteNumber(minConfluence) || minConfluence < 0 || minConfluence > 1)) {
      return problems.add(`${path}.minConfluence`, 'must be a number in [0, 1]')
    }

    const entryNode = parseCondition(entry, `${path}.entry`, shape, problems)
    if (!entryNode) return

    const strategy: StrategyDefinition = { id, regimeIds: ids, direction, entry: entryNode }
    if (typeof name === 'string') strategy.name = name
    if (isFiniteNumber(minConfluence)) strategy.minConfluence = minConfluence

    if (confirmations !== undefined) {
      const before = problems.list.length
      strategy.confirmations = parseConfirmations(confirmations, `${path}.confirmations`, shape, problems)
      if (problems.list.length > before) return
    }

    if (strength !== undefined) {
      const spec = parseStrength(strength, `${path}.strength`, indicators, problems)
      if (!spec) return
      strategy.strength = spec
    }

    out.push(strategy)
  })

  checkUniqueIds(out, '$.strategies', problems)
  return out
}

// ============================================================
// Entry points
// ============================================================

/**
 * Validate a parsed JSON value into a StrategyDocument
 */
export function parseStrategyDocument(raw: unknown): Result<StrategyDocument> {
  const context = { module: 'lib/config', function: 'parseStrategyDocument' } as const

  if (!isRecord(raw)) {
    return Result.fail(ErrorCode.CONFIG_INVALID, 'Strategy document must be a JSON object', context)
  }
  if (raw.schemaVersion !== SUPPORTED_SCHEMA_VERSION) {
    return Result.fail(
      ErrorCode.CONFIG_INVALID,
      `Unsupported schemaVersion ${String(raw.schemaVersion)} (expected ${SUPPORTED_SCHEMA_VERSION})`,
      { ...context, extra: { field: '$.schemaVersion' } },
    )
  }

  const problems = new Problems()
  const indicators = parseIndicators(raw.indicators, problems)
  const shape = buildShapeSnapshot(indicators)
  const regimes = parseRegimes(raw.regimes, shape, problems)
  const strategies = parseStrategies(raw.strategies, indicators, regimes, shape, problems)

  if (!problems.ok) {
    const [first] = problems.list
    const more = problems.list.length > 1 ? ` (+${problems.list.length - 1} more)` : ''
    return Result.fail(ErrorCode.CONFIG_INVALID, `Invalid strategy document: ${first}${more}`, {
      ...context,
      extra: { errors: problems.list },
    })
  }

  return Result.ok({ schemaVersion: SUPPORTED_SCHEMA_VERSION, indicators, regimes, strategies })
}

/**
 * Read and validate a strategy document from disk
 */
export async function loadStrategyDocument(path: string): Promise<Result<StrategyDocument>> {
  let raw: unknown
  try {
    raw = JSON.parse(await readFile(path, 'utf8'))
  } catch (e) {
    return Result.err(
      TradingError.from(
        e,
        { module: 'lib/config', function: 'loadStrategyDocument', extra: { path } },
        ErrorCode.CONFIG_READ_FAILED,
      ),
    )
  }
  return parseStrategyDocument(raw)
}

export function toStrategyConfig(doc: StrategyDocument): StrategyConfig {
  return { strategies: doc.strategies, regimes: doc.regimes }
}
