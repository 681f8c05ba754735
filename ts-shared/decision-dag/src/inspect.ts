import { match } from 'ts-pattern'
import { isTerminal } from './node.js'
import type { DagNode, DecisionNode } from './node.js'
import type { NodeStore } from './node-store.js'
import { UnassignedVariableError } from './errors.js'
import { boundStore } from './sink.js'

/*************************************************
 ********* Evaluation and cofactors **************
 *************************************************/

export function evaluate(
  node: DagNode,
  assignment: ReadonlyMap<number, boolean>
): boolean {
  let current = node
  while (current.kind === 'decision') {
    const value = assignment.get(current.depth)
    if (value === undefined) throw new UnassignedVariableError(current.depth)
    current = value ? current.positive : current.negative
  }
  return current.value === 1
}

/** Cofactor of `node` with each variable in `bindings` fixed to its value,
 * rebuilt through `store`. */
export function restrictIn(
  store: NodeStore,
  node: DagNode,
  bindings: ReadonlyMap<number, boolean>
): DagNode {
  if (isTerminal(node) || bindings.size === 0) return node

  const memo = new Map<DagNode, DagNode>()
  const go = (n: DagNode): DagNode => {
    if (n.kind === 'terminal') return n
    const existing = memo.get(n)
    if (existing !== undefined) return existing

    const bound = bindings.get(n.depth)
    const res =
      bound !== undefined
        ? go(bound ? n.positive : n.negative)
        : store.emplace(n.depth, go(n.negative), go(n.positive))
    memo.set(n, res)
    return res
  }
  return go(node)
}

export function restrict(
  node: DagNode,
  bindings: ReadonlyMap<number, boolean>
): DagNode {
  return restrictIn(boundStore('restrict'), node, bindings)
}

/*************************************************
 ******************* Traversal *******************
 *************************************************/

function reachableDecisions(node: DagNode): Set<DecisionNode> {
  const visited = new Set<DecisionNode>()
  const go = (n: DagNode) => {
    if (n.kind === 'terminal' || visited.has(n)) return
    visited.add(n)
    go(n.negative)
    go(n.positive)
  }
  go(node)
  return visited
}

/** Indices of the variables the diagram decides on */
export function support(node: DagNode): ReadonlySet<number> {
  const vars = new Set<number>()
  for (const n of reachableDecisions(node)) vars.add(n.depth)
  return vars
}

/** Number of distinct decision nodes reachable from `node` */
export function nodeCount(node: DagNode): number {
  return reachableDecisions(node).size
}

/**
 * Renders `node` as nested conditionals, e.g. `x0 ? 1 : (x1 ? 0 : 1)`.
 * Shared sub-diagrams are printed at every occurrence.
 */
export function render(node: DagNode): string {
  const nested = (n: DagNode) =>
    n.kind === 'terminal' ? render(n) : `(${render(n)})`
  return match<DagNode, string>(node)
    .with({ kind: 'terminal' }, (t) => `${t.value}`)
    .with(
      { kind: 'decision' },
      (d) => `x${d.depth} ? ${nested(d.positive)} : ${nested(d.negative)}`
    )
    .exhaustive()
}
