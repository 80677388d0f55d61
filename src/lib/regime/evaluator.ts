// ============================================================
// Condition Tree Evaluator
// ============================================================
// One recursive walker for regime and strategy trees. Nodes arrive from
// JSON, so every node is shape-checked here; a bad node evaluates
// 'unknown' at its own position without affecting its siblings.
// ============================================================

import type { IndicatorSnapshot } from '../indicators/types'
import type {
  ComparisonOperator,
  ConditionEvaluation,
  ConditionNode,
  EvaluationIssue,
  Operand,
  TriState,
} from './types'

const COMPARATORS: Record<ComparisonOperator, (a: number, b: number) => boolean> = {
  gt: (a, b) => a > b,
  lt: (a, b) => a < b,
  gte: (a, b) => a >= b,
  lte: (a, b) => a <= b,
  eq: (a, b) => a === b,
  ne: (a, b) => a !== b,
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isComparisonOperator(value: unknown): value is ComparisonOperator {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(COMPARATORS, value)
}

const NODE_KINDS = ['all', 'any', 'not', 'op'] as const

export function isOperand(value: unknown): value is Operand {
  if (!isRecord(value)) return false
  if ('value' in value) return typeof value.value === 'number' && Number.isFinite(value.value)
  return typeof value.indicatorId === 'string' && typeof value.field === 'string'
}

/**
 * Structural check of a whole tree, for data read from outside
 */
export function isConditionNode(value: unknown): value is ConditionNode {
  if (!isRecord(value)) return false
  const kinds = NODE_KINDS.filter((k) => k in value)
  if (kinds.length !== 1) return false

  switch (kinds[0]) {
    case 'all':
      return Array.isArray(value.all) && value.all.every(isConditionNode)
    case 'any':
      return Array.isArray(value.any) && value.any.every(isConditionNode)
    case 'not':
      return isConditionNode(value.not)
    default: {
      if (value.op === 'between') {
        const range: Record<string, unknown> = isRecord(value.right) ? value.right : {}
        const { min, max } = range
        return isOperand(value.left) && typeof min === 'number' && typeof max === 'number' && min <= max
      }
      return isComparisonOperator(value.op) && isOperand(value.left) && isOperand(value.right)
    }
  }
}

type Resolved = { ok: true; value: number } | { ok: false; issue: Omit<EvaluationIssue, 'path'> }

function resolveOperand(operand: unknown, snapshot: IndicatorSnapshot): Resolved {
  if (!isRecord(operand)) {
    return { ok: false, issue: { kind: 'malformed', message: 'operand must be an object' } }
  }

  if ('value' in operand) {
    const { value } = operand
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return { ok: false, issue: { kind: 'malformed', message: 'literal operand must be a finite number' } }
    }
    return { ok: true, value }
  }

  const { indicatorId, field } = operand
  if (typeof indicatorId !== 'string' || typeof field !== 'string') {
    return {
      ok: false,
      issue: { kind: 'malformed', message: 'operand needs either value or indicatorId and field' },
    }
  }

  const fields = snapshot[indicatorId]
  if (fields === undefined) {
    return {
      ok: false,
      issue: { kind: 'missing_indicator', message: `indicator "${indicatorId}" not in snapshot`, indicatorId, field },
    }
  }
  if (!(field in fields)) {
    return {
      ok: false,
      issue: { kind: 'missing_field', message: `field "${indicatorId}.${field}" does not exist`, indicatorId, field },
    }
  }
  const value = fields[field]
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return {
      ok: false,
      issue: { kind: 'undefined_operand', message: `"${indicatorId}.${field}" is undefined`, indicatorId, field },
    }
  }
  return { ok: true, value }
}

function evaluateLeaf(
  node: Record<string, unknown>,
  snapshot: IndicatorSnapshot,
  path: string,
  issues: EvaluationIssue[],
): TriState {
  const { op } = node

  if (op === 'between') {
    const range: Record<string, unknown> = isRecord(node.right) ? node.right : {}
    const { min, max } = range
    if (typeof min !== 'number' || typeof max !== 'number' || min > max) {
      issues.push({ kind: 'malformed', path, message: 'between needs right: {min, max} with min <= max' })
      return 'unknown'
    }
    const left = resolveOperand(node.left, snapshot)
    if (!left.ok) {
      issues.push({ ...left.issue, path: `${path}.left` })
      return 'unknown'
    }
    return left.value >= min && left.value <= max
  }

  if (!isComparisonOperator(op)) {
    issues.push({ kind: 'malformed', path, message: `unknown operator "${String(op)}"` })
    return 'unknown'
  }

  // resolve both sides so every missing reference gets reported
  const left = resolveOperand(node.left, snapshot)
  const right = resolveOperand(node.right, snapshot)
  if (!left.ok) issues.push({ ...left.issue, path: `${path}.left` })
  if (!right.ok) issues.push({ ...right.issue, path: `${path}.right` })
  if (!left.ok || !right.ok) return 'unknown'

  return COMPARATORS[op](left.value, right.value)
}

function walk(
  node: unknown,
  snapshot: IndicatorSnapshot,
  path: string,
  issues: EvaluationIssue[],
  exhaustive: boolean,
): TriState {
  if (!isRecord(node)) {
    issues.push({ kind: 'malformed', path, message: 'node must be an object' })
    return 'unknown'
  }

  const kinds = NODE_KINDS.filter((k) => k in node)
  if (kinds.length !== 1) {
    issues.push({
      kind: 'malformed',
      path,
      message: kinds.length === 0 ? 'node has no all/any/not/op' : `node mixes ${kinds.join(', ')}`,
    })
    return 'unknown'
  }

  switch (kinds[0]) {
    case 'all': {
      const children = node.all
      if (!Array.isArray(children)) {
        issues.push({ kind: 'malformed', path, message: 'all must be an array' })
        return 'unknown'
      }
      let sawFalse = false
      let sawUnknown = false
      for (let i = 0; i < children.length; i++) {
        const value = walk(children[i], snapshot, `${path}.all[${i}]`, issues, exhaustive)
        if (value === false) {
          if (!exhaustive) return false
          sawFalse = true
        }
        if (value === 'unknown') sawUnknown = true
      }
      if (sawFalse) return false
      return sawUnknown ? 'unknown' : true
    }

    case 'any': {
      const children = node.any
      if (!Array.isArray(children)) {
        issues.push({ kind: 'malformed', path, message: 'any must be an array' })
        return 'unknown'
      }
      let sawTrue = false
      let sawUnknown = false
      for (let i = 0; i < children.length; i++) {
        const value = walk(children[i], snapshot, `${path}.any[${i}]`, issues, exhaustive)
        if (value === true) {
          if (!exhaustive) return true
          sawTrue = true
        }
        if (value === 'unknown') sawUnknown = true
      }
      if (sawTrue) return true
      return sawUnknown ? 'unknown' : false
    }

    case 'not': {
      const value = walk(node.not, snapshot, `${path}.not`, issues, exhaustive)
      return value === 'unknown' ? 'unknown' : !value
    }

    default:
      return evaluateLeaf(node, snapshot, path, issues)
  }
}

/**
 * Evaluate a tree against the latest indicator values.
 * `all` stops at the first false child and `any` at the first true one.
 */
export function evaluateCondition(node: ConditionNode, snapshot: IndicatorSnapshot): ConditionEvaluation {
  const issues: EvaluationIssue[] = []
  const value = walk(node, snapshot, '$', issues, false)
  return { value, issues }
}

/**
 * Same walk for a tree that has not been type-checked yet, e.g. while
 * validating a document. Visits every node, so every problem is reported.
 */
export function checkCondition(node: unknown, snapshot: IndicatorSnapshot): ConditionEvaluation {
  const issues: EvaluationIssue[] = []
  const value = walk(node, snapshot, '$', issues, true)
  return { value, issues }
}

/**
 * Two-valued view: only a definite true counts
 */
export function isSatisfied(evaluation: ConditionEvaluation): boolean {
  return evaluation.value === true
}

/**
 * Every indicator id a tree refers to, in first-seen order
 */
export function collectIndicatorIds(node: unknown, out: string[] = []): string[] {
  if (!isRecord(node)) return out
  if (Array.isArray(node.all)) node.all.forEach((child) => collectIndicatorIds(child, out))
  if (Array.isArray(node.any)) node.any.forEach((child) => collectIndicatorIds(child, out))
  if ('not' in node) collectIndicatorIds(node.not, out)
  for (const side of [node.left, node.right]) {
    const id = isRecord(side) ? side.indicatorId : undefined
    if (typeof id === 'string' && !out.includes(id)) out.push(id)
  }
  return out
}
