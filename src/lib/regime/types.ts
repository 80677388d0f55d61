// ============================================================
// Regime & Condition Types
// ============================================================

/**
 * Reference to one field of a named indicator, or a literal
 */
export type Operand = IndicatorRef | LiteralOperand

export interface IndicatorRef {
  indicatorId: string
  field: string
}

export interface LiteralOperand {
  value: number
}

export type ComparisonOperator = 'gt' | 'lt' | 'gte' | 'lte' | 'eq' | 'ne'

export interface ComparisonLeaf {
  left: Operand
  op: ComparisonOperator
  right: Operand
}

/** Inclusive range check */
export interface BetweenLeaf {
  left: Operand
  op: 'between'
  right: { min: number; max: number }
}

export type ConditionLeaf = ComparisonLeaf | BetweenLeaf

export interface AllNode {
  all: ConditionNode[]
}

export interface AnyNode {
  any: ConditionNode[]
}

export interface NotNode {
  not: ConditionNode
}

export type ConditionNode = AllNode | AnyNode | NotNode | ConditionLeaf

export type RegimeScope = 'entry' | 'exit'

export interface RegimeDefinition {
  id: string
  name?: string
  conditions: ConditionNode
  scope: RegimeScope
  /** higher wins when a single regime must be picked; default 0 */
  priority?: number
}

export type ActiveRegimeSet = ReadonlySet<string>

/**
 * Three-valued outcome. 'unknown' comes from missing or undefined
 * operands and malformed nodes; it never activates a regime.
 */
export type TriState = true | false | 'unknown'

export type IssueKind = 'missing_indicator' | 'missing_field' | 'undefined_operand' | 'malformed'

export interface EvaluationIssue {
  kind: IssueKind
  /** location in the tree, e.g. "all[1].not" */
  path: string
  message: string
  indicatorId?: string
  field?: string
}

export interface ConditionEvaluation {
  value: TriState
  issues: EvaluationIssue[]
}
