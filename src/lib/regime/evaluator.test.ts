import { describe, it, expect } from 'vitest'
import {
  checkCondition,
  collectIndicatorIds,
  evaluateCondition,
  isConditionNode,
  isSatisfied,
} from './evaluator'
import { cond, ref } from './builders'
import type { IndicatorSnapshot } from '../indicators/types'
import type { ConditionNode } from './types'

const snapshot: IndicatorSnapshot = {
  adx14: { value: 30, plus_di: 25, minus_di: 12 },
  ema20: { value: 101 },
  ema50: { value: 99 },
  rsi14: { value: null },
}

describe('evaluateCondition', () => {
  // ============================================================
  // Leaves
  // ============================================================
  describe('leaves', () => {
    it('should compare an indicator against a literal', () => {
      expect(evaluateCondition(cond.gt(ref('adx14'), 25), snapshot)).toEqual({ value: true, issues: [] })
      expect(evaluateCondition(cond.lt(ref('adx14'), 25), snapshot).value).toBe(false)
    })

    it('should compare two indicators', () => {
      expect(evaluateCondition(cond.gt(ref('ema20'), ref('ema50')), snapshot).value).toBe(true)
    })

    it('should treat both bounds of between as inclusive', () => {
      expect(evaluateCondition(cond.between(ref('adx14'), 30, 40), snapshot).value).toBe(true)
      expect(evaluateCondition(cond.between(ref('adx14'), 20, 30), snapshot).value).toBe(true)
      expect(evaluateCondition(cond.between(ref('adx14'), 31, 40), snapshot).value).toBe(false)
    })

    it('should support every comparison operator', () => {
      expect(evaluateCondition(cond.gte(ref('adx14'), 30), snapshot).value).toBe(true)
      expect(evaluateCondition(cond.lte(ref('adx14'), 29), snapshot).value).toBe(false)
      expect(evaluateCondition(cond.eq(ref('adx14', 'plus_di'), 25), snapshot).value).toBe(true)
      expect(evaluateCondition(cond.ne(ref('adx14', 'plus_di'), 25), snapshot).value).toBe(false)
    })
  })

  // ============================================================
  // Missing values
  // ============================================================
  describe('missing values', () => {
    it('should be unknown for an undefined operand', () => {
      const result = evaluateCondition(cond.gt(ref('rsi14'), 50), snapshot)
      expect(result.value).toBe('unknown')
      expect(result.issues).toEqual([
        {
          kind: 'undefined_operand',
          path: '$.left',
          message: '"rsi14.value" is undefined',
          indicatorId: 'rsi14',
          field: 'value',
        },
      ])
    })

    it('should report a missing indicator and a missing field separately', () => {
      const result = evaluateCondition(cond.gt(ref('atr14'), ref('adx14', 'slope')), snapshot)
      expect(result.value).toBe('unknown')
      expect(result.issues.map((i) => [i.kind, i.path])).toEqual([
        ['missing_indicator', '$.left'],
        ['missing_field', '$.right'],
      ])
    })

    it('should treat a non-finite value as undefined', () => {
      const broken: IndicatorSnapshot = { chop: { value: Number.NaN }, atr: { value: Number.POSITIVE_INFINITY } }
      const nan = evaluateCondition(cond.ne(ref('chop'), 50), broken)
      expect(nan.value).toBe('unknown')
      expect(nan.issues.map((i) => i.kind)).toEqual(['undefined_operand'])
      expect(evaluateCondition(cond.gt(ref('atr'), 1), broken).value).toBe('unknown')
    })

    it('should keep not(not(x)) equal to x', () => {
      const twice = (node: ConditionNode) => evaluateCondition(cond.not(cond.not(node)), snapshot).value
      expect(twice(cond.gt(ref('adx14'), 25))).toBe(true)
      expect(twice(cond.lt(ref('adx14'), 25))).toBe(false)
      expect(twice(cond.gt(ref('rsi14'), 50))).toBe('unknown')
    })

    it('should keep not(unknown) unknown', () => {
      const result = evaluateCondition(cond.not(cond.gt(ref('rsi14'), 50)), snapshot)
      expect(result.value).toBe('unknown')
      expect(result.issues[0].path).toBe('$.not.left')
      expect(isSatisfied(result)).toBe(false)
    })
  })

  // ============================================================
  // Combinators
  // ============================================================
  describe('combinators', () => {
    it('should let a false child decide all even next to an unknown one', () => {
      const tree = cond.all(cond.gt(ref('rsi14'), 50), cond.lt(ref('adx14'), 10))
      expect(evaluateCondition(tree, snapshot).value).toBe(false)
    })

    it('should keep all unknown when the rest is true', () => {
      const tree = cond.all(cond.gt(ref('adx14'), 25), cond.gt(ref('rsi14'), 50))
      expect(evaluateCondition(tree, snapshot).value).toBe('unknown')
    })

    it('should let a true child decide any even next to an unknown one', () => {
      const tree = cond.any(cond.gt(ref('rsi14'), 50), cond.gt(ref('adx14'), 25))
      expect(evaluateCondition(tree, snapshot).value).toBe(true)
    })

    it('should keep any unknown when the rest is false', () => {
      const tree = cond.any(cond.gt(ref('rsi14'), 50), cond.lt(ref('adx14'), 25))
      expect(evaluateCondition(tree, snapshot).value).toBe('unknown')
    })

    it('should treat empty all as true and empty any as false', () => {
      expect(evaluateCondition(cond.all(), snapshot).value).toBe(true)
      expect(evaluateCondition(cond.any(), snapshot).value).toBe(false)
    })

    it('should stop all at the first false child', () => {
      const tree = cond.all(cond.lt(ref('adx14'), 10), cond.gt(ref('missing'), 1))
      expect(evaluateCondition(tree, snapshot)).toEqual({ value: false, issues: [] })
    })
  })

  // ============================================================
  // Malformed nodes
  // ============================================================
  describe('malformed nodes', () => {
    it('should report an unknown operator at its own path', () => {
      const raw = { all: [cond.gt(ref('adx14'), 25), { left: { value: 1 }, op: 'approx', right: { value: 1 } }] }
      const result = checkCondition(raw, snapshot)
      expect(result.value).toBe('unknown')
      expect(result.issues).toEqual([{ kind: 'malformed', path: '$.all[1]', message: 'unknown operator "approx"' }])
    })

    it('should report a node mixing two kinds', () => {
      const result = checkCondition({ all: [], any: [] }, snapshot)
      expect(result.issues[0].message).toBe('node mixes all, any')
    })

    it('should reject between with min above max', () => {
      const result = checkCondition({ left: { value: 5 }, op: 'between', right: { min: 10, max: 1 } }, snapshot)
      expect(result.value).toBe('unknown')
      expect(result.issues[0].kind).toBe('malformed')
    })
  })
})

describe('checkCondition', () => {
  it('should visit siblings after a decided child', () => {
    const raw = { any: [{ left: { value: 2 }, op: 'gt', right: { value: 1 } }, { op: 'gt' }] }

    expect(checkCondition(raw, {}).value).toBe(true)
    expect(checkCondition(raw, {}).issues.map((i) => i.path)).toEqual(['$.any[1].left', '$.any[1].right'])
  })
})

describe('isConditionNode', () => {
  it('should accept trees built with the helpers', () => {
    expect(isConditionNode(cond.all(cond.not(cond.gt(ref('a'), 1)), cond.between(ref('b'), 0, 1)))).toBe(true)
  })

  it('should reject bad shapes', () => {
    expect(isConditionNode(null)).toBe(false)
    expect(isConditionNode({ all: 'x' })).toBe(false)
    expect(isConditionNode({ left: { indicatorId: 'a' }, op: 'gt', right: { value: 1 } })).toBe(false)
    expect(isConditionNode({ left: { value: 1 }, op: 'between', right: { min: 2, max: 1 } })).toBe(false)
  })
})

describe('collectIndicatorIds', () => {
  it('should list ids in first-seen order without duplicates', () => {
    const tree = cond.all(
      cond.gt(ref('ema20'), ref('ema50')),
      cond.any(cond.gt(ref('adx14'), 25), cond.not(cond.lt(ref('ema20'), 1))),
    )
    expect(collectIndicatorIds(tree)).toEqual(['ema20', 'ema50', 'adx14'])
  })
})
