import type {
  AllNode,
  AnyNode,
  BetweenLeaf,
  ComparisonLeaf,
  ComparisonOperator,
  ConditionNode,
  IndicatorRef,
  NotNode,
  Operand,
} from './types'

/** Operand side: a reference, or a bare number for a literal */
export type Side = Operand | number

export const ref = (indicatorId: string, field = 'value'): IndicatorRef => ({ indicatorId, field })

const toOperand = (side: Side): Operand => (typeof side === 'number' ? { value: side } : side)

const compare =
  (op: ComparisonOperator) =>
  (left: Side, right: Side): ComparisonLeaf => ({ left: toOperand(left), op, right: toOperand(right) })

/**
 * Shorthand for writing condition trees in code
 *
 * @example
 * cond.all(cond.gt(ref('adx14'), 25), cond.gt(ref('ema20'), ref('ema50')))
 */
export const cond = {
  all: (...nodes: ConditionNode[]): AllNode => ({ all: nodes }),
  any: (...nodes: ConditionNode[]): AnyNode => ({ any: nodes }),
  not: (node: ConditionNode): NotNode => ({ not: node }),
  gt: compare('gt'),
  lt: compare('lt'),
  gte: compare('gte'),
  lte: compare('lte'),
  eq: compare('eq'),
  ne: compare('ne'),
  between: (left: Side, min: number, max: number): BetweenLeaf => ({
    left: toOperand(left),
    op: 'between',
    right: { min, max },
  }),
}
