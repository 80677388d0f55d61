import { describe, it, expect, vi } from 'vitest'
import { compareIds, detectActiveRegimes, evaluateRegimes, rankActiveRegimes } from './detector'
import { cond, ref } from './builders'
import type { RegimeDefinition } from './types'
import type { IndicatorSnapshot } from '../indicators/types'
import type { TelemetryEvent } from '../telemetry'

const snapshot: IndicatorSnapshot = {
  adx14: { value: 32, plus_di: 28, minus_di: 14 },
  chop14: { value: null },
}

const regimes: RegimeDefinition[] = [
  { id: 'trend', scope: 'entry', priority: 5, conditions: cond.gt(ref('adx14'), 25) },
  { id: 'bull', scope: 'entry', priority: 8, conditions: cond.gt(ref('adx14', 'plus_di'), ref('adx14', 'minus_di')) },
  { id: 'choppy', scope: 'entry', conditions: cond.gt(ref('chop14'), 60) },
  { id: 'exit_trend_fade', scope: 'exit', conditions: cond.lt(ref('adx14'), 40) },
]

describe('detectActiveRegimes', () => {
  it('should return only the definitely-true regimes of the scope', () => {
    const active = detectActiveRegimes(snapshot, regimes, 'entry')
    expect([...active].sort()).toEqual(['bull', 'trend'])
  })

  it('should evaluate exit regimes separately', () => {
    expect([...detectActiveRegimes(snapshot, regimes, 'exit')]).toEqual(['exit_trend_fade'])
  })

  it('should return an empty set for an empty snapshot', () => {
    expect(detectActiveRegimes({}, regimes, 'entry').size).toBe(0)
  })

  it('should send one telemetry event per issue', () => {
    const events: TelemetryEvent[] = []
    detectActiveRegimes(snapshot, regimes, 'entry', {
      symbol: 'ETHUSDT',
      timestamp: 1_000,
      telemetry: (e) => events.push(e),
    })

    expect(events).toEqual([
      {
        stage: 'regime',
        reason: 'undefined_operand',
        symbol: 'ETHUSDT',
        timestamp: 1_000,
        detail: { regimeId: 'choppy', path: '$.left', message: '"chop14.value" is undefined' },
      },
    ])
  })

  it('should keep other regimes when one tree is malformed', () => {
    const broken: RegimeDefinition[] = [
      ...regimes,
      // a tree that never went through document validation
      { id: 'broken', scope: 'entry', conditions: JSON.parse('{"all":[{"op":"gt"}]}') },
    ]
    const sink = vi.fn()
    const active = detectActiveRegimes(snapshot, broken, 'entry', { telemetry: sink })

    expect(active.has('broken')).toBe(false)
    expect(active.has('trend')).toBe(true)
    // choppy once, broken for each side of its leaf
    expect(sink).toHaveBeenCalledTimes(3)
  })
})

describe('evaluateRegimes', () => {
  it('should report the three-valued outcome per regime', () => {
    const results = evaluateRegimes(snapshot, regimes, 'entry')
    expect(results.map((r) => [r.regimeId, r.value, r.active])).toEqual([
      ['trend', true, true],
      ['bull', true, true],
      ['choppy', 'unknown', false],
    ])
  })
})

describe('rankActiveRegimes', () => {
  it('should order by priority, then id', () => {
    const defs: RegimeDefinition[] = [
      { id: 'b', scope: 'entry', priority: 1, conditions: cond.all() },
      { id: 'a', scope: 'entry', priority: 1, conditions: cond.all() },
      { id: 'c', scope: 'entry', priority: 3, conditions: cond.all() },
      { id: 'd', scope: 'entry', conditions: cond.all() },
    ]
    const ranked = rankActiveRegimes(new Set(['a', 'b', 'c', 'd']), defs)
    expect(ranked.map((r) => r.id)).toEqual(['c', 'a', 'b', 'd'])
  })

  it('should leave out inactive regimes', () => {
    expect(rankActiveRegimes(new Set(['bull']), regimes).map((r) => r.id)).toEqual(['bull'])
  })
})

describe('compareIds', () => {
  it('should compare by code unit', () => {
    expect(['b', 'B', 'a'].sort(compareIds)).toEqual(['B', 'a', 'b'])
  })
})
