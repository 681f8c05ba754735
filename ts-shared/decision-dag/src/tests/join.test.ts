import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  NodeStore,
  ONE,
  ZERO,
  bind,
  combine,
  conjoin,
  disjoin,
  join,
  joinPair,
  literal,
  newJoinCache,
  nodeCount,
} from '../index.js'
import type { DagNode } from '../index.js'

let store: NodeStore

beforeEach(() => {
  store = new NodeStore('join')
  bind(store)
})

afterEach(() => {
  bind(undefined)
  vi.restoreAllMocks()
})

function compound(): DagNode {
  return disjoin(
    conjoin(literal(0, true), literal(1, false)),
    literal(2, true)
  )
}

describe('identity and annihilator laws', () => {
  it('holds for literals and compound diagrams', () => {
    for (const n of [literal(4, true), compound()]) {
      expect(disjoin(n, ZERO)).toBe(n)
      expect(disjoin(ZERO, n)).toBe(n)
      expect(disjoin(n, ONE)).toBe(ONE)
      expect(conjoin(n, ONE)).toBe(n)
      expect(conjoin(n, ZERO)).toBe(ZERO)
      expect(conjoin(ZERO, n)).toBe(ZERO)
    }
  })

  it('combines terminals', () => {
    expect(conjoin(ONE, ONE)).toBe(ONE)
    expect(conjoin(ONE, ZERO)).toBe(ZERO)
    expect(disjoin(ZERO, ZERO)).toBe(ZERO)
    expect(disjoin(ZERO, ONE)).toBe(ONE)
  })
})

describe('complementation', () => {
  it('a ∨ ¬a = 1 and a ∧ ¬a = 0 without creating nodes', () => {
    const input = new NodeStore('input')
    const a = input.literal(0, true)
    const aBar = input.literal(0, false)

    expect(disjoin(a, aBar)).toBe(ONE)
    expect(conjoin(a, aBar)).toBe(ZERO)
    expect(store.size).toBe(0)
  })
})

describe('depth alignment', () => {
  it('¬a ∨ ¬b keeps ¬b whole on the positive branch of a', () => {
    const input = new NodeStore('input')
    const aBar = input.literal(0, false)
    const bBar = input.literal(1, false)

    const res = disjoin(aBar, bBar)

    expect(store.size).toBe(1)
    expect(res.kind).toBe('decision')
    if (res.kind !== 'decision') return
    expect(res.depth).toBe(0)
    expect(res.negative).toBe(ONE)
    expect(res.positive).toBe(bBar)
  })

  it('¬a ∨ b has b on the positive branch of a', () => {
    const aBar = literal(0, false)
    const b = literal(1, true)

    const res = disjoin(aBar, b)

    expect(res.kind === 'decision' && res.negative).toBe(ONE)
    expect(res.kind === 'decision' && res.positive).toBe(b)
  })

  it('is independent of operand order', () => {
    const a = literal(0, true)
    const c = literal(2, false)
    expect(conjoin(c, a)).toBe(conjoin(a, c))
    expect(disjoin(c, a)).toBe(disjoin(a, c))
  })

  it('reduces absorption: x ∨ (x ∧ y) = x', () => {
    const x = literal(0, true)
    const y = literal(1, true)
    expect(disjoin(x, conjoin(x, y))).toBe(x)
    expect(conjoin(x, disjoin(x, y))).toBe(x)
  })

  it('splits both operands when they decide on the same variable', () => {
    const x0 = literal(0, true)
    const x1 = literal(1, true)
    const x2 = literal(2, true)
    // (x0 ∧ x1) ∨ (x0 ∧ x2) = x0 ∧ (x1 ∨ x2)
    expect(disjoin(conjoin(x0, x1), conjoin(x0, x2))).toBe(
      conjoin(x0, disjoin(x1, x2))
    )
  })
})

describe('n-ary folding', () => {
  it('folds left to the same canonical node', () => {
    const x = literal(0, true)
    const y = literal(1, false)
    const z = literal(2, true)

    expect(conjoin(x, y, z)).toBe(conjoin(conjoin(x, y), z))
    expect(disjoin(x, y, z)).toBe(disjoin(x, disjoin(y, z)))
  })

  it('returns a single operand unchanged', () => {
    const x = literal(7, true)
    expect(conjoin(x)).toBe(x)
    expect(disjoin(ONE)).toBe(ONE)
  })

  it('builds a chain of one node per variable for a conjunction of literals', () => {
    const input = new NodeStore('input')
    const res = conjoin(
      input.literal(0, true),
      input.literal(1, true),
      input.literal(2, true)
    )
    expect(nodeCount(res)).toBe(3)
    // x0 ∧ x1 from the first fold step, then x1 ∧ x2 and the root
    expect(store.size).toBe(3)
    expect(res.kind === 'decision' && res.depth).toBe(0)
  })
})

describe('join', () => {
  it('takes the identity and annihilator explicitly', () => {
    const x = literal(0, true)
    const y = literal(1, true)
    expect(join(ONE, ZERO, x, y)).toBe(conjoin(x, y))
    expect(join(ZERO, ONE, x, y)).toBe(disjoin(x, y))
  })

  it('combine(true) is AND and combine(false) is OR', () => {
    const a = literal(0, true)
    const aBar = literal(0, false)
    expect(combine(true, a, aBar)).toBe(ZERO)
    expect(combine(false, a, aBar)).toBe(ONE)
  })

  it('is also available on an explicit store', () => {
    bind(undefined)
    const explicit = new NodeStore('explicit')
    const x = explicit.literal(0, true)
    const y = explicit.literal(1, true)

    expect(explicit.join(ONE, ZERO, x, y)).toBe(explicit.conjoin(x, y))
    expect(explicit.disjoin(x, explicit.invert(x))).toBe(ONE)
  })
})

describe('joinPair', () => {
  it('memoizes on the unordered operand pair', () => {
    const x = literal(0, true)
    const y = literal(1, true)
    const cache = newJoinCache()
    const emplaceSpy = vi.spyOn(store, 'emplace')

    const first = joinPair(store, cache, ONE, ZERO, x, y)
    const second = joinPair(store, cache, ONE, ZERO, y, x)

    expect(second).toBe(first)
    expect(emplaceSpy).toHaveBeenCalledTimes(1)
    expect(emplaceSpy).toHaveBeenCalledWith(0, ZERO, y)
  })
})
