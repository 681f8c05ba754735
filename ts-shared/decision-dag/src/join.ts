import ArrayKeyedMap from 'array-keyed-map'
import { ONE, ZERO, constant } from './node.js'
import type { DagNode, TerminalNode } from './node.js'
import type { NodeStore } from './node-store.js'
import { boundStore } from './sink.js'
import { createLogger } from './log.js'

const log = createLogger('join')

/** Memo for one top-level join, keyed by the operand pair in id order */
export type JoinCache = ArrayKeyedMap<[DagNode, DagNode], DagNode>

export function newJoinCache(): JoinCache {
  return new ArrayKeyedMap<[DagNode, DagNode], DagNode>()
}

function pairKey(x: DagNode, y: DagNode): [DagNode, DagNode] {
  return x.id <= y.id ? [x, y] : [y, x]
}

/** The [negative, positive] views of `node` below the variable `top`.
 * A node that does not decide on `top` is the same function on both branches. */
function branchesAt(node: DagNode, top: number): [DagNode, DagNode] {
  return node.kind === 'decision' && node.depth === top
    ? [node.negative, node.positive]
    : [node, node]
}

/**
 * Combines two diagrams under the commutative operator whose identity and
 * annihilator are given: `(ONE, ZERO)` is AND, `(ZERO, ONE)` is OR.
 *
 * The operands may decide on different variable sets. Only the operand(s)
 * deciding on `min(dx, dy)` are split; the other is held on both branches.
 */
export function joinPair(
  store: NodeStore,
  cache: JoinCache,
  identity: TerminalNode,
  annihilator: TerminalNode,
  x: DagNode,
  y: DagNode
): DagNode {
  if (x === identity) return y
  if (y === identity) return x
  if (x === annihilator || y === annihilator) return annihilator

  const key = pairKey(x, y)
  const cached = cache.get(key)
  if (cached !== undefined) return cached

  const top = Math.min(x.depth, y.depth)
  const [xNeg, xPos] = branchesAt(x, top)
  const [yNeg, yPos] = branchesAt(y, top)

  const negative = joinPair(store, cache, identity, annihilator, xNeg, yNeg)
  const positive = joinPair(store, cache, identity, annihilator, xPos, yPos)
  const res = store.emplace(top, negative, positive)
  cache.set(key, res)
  return res
}

/** Left fold of `joinPair` over the operands, sharing one fresh cache. */
export function joinIn(
  store: NodeStore,
  identity: TerminalNode,
  annihilator: TerminalNode,
  operands: readonly [DagNode, ...DagNode[]]
): DagNode {
  const cache = newJoinCache()
  const [first, ...rest] = operands
  const res = rest.reduce(
    (acc, operand) =>
      joinPair(store, cache, identity, annihilator, acc, operand),
    first
  )
  log.debug(
    `${identity === ONE ? 'conjoin' : 'disjoin'} of ${operands.length} operands in ${store.label}, memo size ${cache.size}`
  )
  return res
}

/*************************
   Bound-store operators
**************************/

export function join(
  identity: TerminalNode,
  annihilator: TerminalNode,
  first: DagNode,
  ...rest: DagNode[]
): DagNode {
  return joinIn(boundStore('join'), identity, annihilator, [first, ...rest])
}

export function conjoin(first: DagNode, ...rest: DagNode[]): DagNode {
  return join(ONE, ZERO, first, ...rest)
}

export function disjoin(first: DagNode, ...rest: DagNode[]): DagNode {
  return join(ZERO, ONE, first, ...rest)
}

/** `combine(true, ...)` is AND and `combine(false, ...)` is OR. */
export function combine(
  identity: boolean,
  first: DagNode,
  ...rest: DagNode[]
): DagNode {
  return join(constant(identity), constant(!identity), first, ...rest)
}
