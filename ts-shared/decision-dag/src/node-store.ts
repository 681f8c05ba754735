import { freshNodeId, isVariableIndex, ONE, ZERO } from './node.js'
import type { DagNode, DecisionNode, NodeId, TerminalNode } from './node.js'
import { InvalidDepthError } from './errors.js'
import { literalIn } from './literal.js'
import { invertIn } from './invert.js'
import { joinIn } from './join.js'
import { restrictIn } from './inspect.js'

type NodeKey = `${number},${NodeId},${NodeId}`

function nodeKey(depth: number, negative: DagNode, positive: DagNode): NodeKey {
  return `${depth},${negative.id},${positive.id}`
}

/**
 * Interning table for decision nodes (hash-consing).
 *
 * Structurally equal nodes emplaced into the same store are the same object,
 * so function equivalence within a store is reference equality. Interning is
 * per store: equal nodes built in two stores are distinct.
 *
 * Besides serving as the target of the bound-store API (see `bind`), a store
 * can be used directly as an explicit construction context.
 */
export class NodeStore implements Iterable<DecisionNode> {
  readonly #uniqueTable = new Map<NodeKey, DecisionNode>()

  constructor(readonly label: string = 'store') {}

  get size(): number {
    return this.#uniqueTable.size
  }

  /** The canonical node for `(depth, negative, positive)`, or the shared
   * child itself when both branches are the same. */
  emplace(depth: number, negative: DagNode, positive: DagNode): DagNode {
    if (negative === positive) return negative
    if (!isVariableIndex(depth)) throw new InvalidDepthError(depth)

    const key = nodeKey(depth, negative, positive)
    const existing = this.#uniqueTable.get(key)
    if (existing !== undefined) return existing

    const node = Object.freeze<DecisionNode>({
      kind: 'decision',
      id: freshNodeId(),
      depth,
      negative,
      positive,
    })
    this.#uniqueTable.set(key, node)
    return node
  }

  has(node: DagNode): boolean {
    if (node.kind === 'terminal') return false
    return (
      this.#uniqueTable.get(nodeKey(node.depth, node.negative, node.positive)) ===
      node
    )
  }

  [Symbol.iterator](): Iterator<DecisionNode> {
    return this.#uniqueTable.values()
  }

  /*************************
      Explicit-context API
  **************************/

  literal(variableIndex: number, sign: boolean): DagNode {
    return literalIn(this, variableIndex, sign)
  }

  invert(node: DagNode): DagNode {
    return invertIn(this, node)
  }

  join(
    identity: TerminalNode,
    annihilator: TerminalNode,
    first: DagNode,
    ...rest: DagNode[]
  ): DagNode {
    return joinIn(this, identity, annihilator, [first, ...rest])
  }

  conjoin(first: DagNode, ...rest: DagNode[]): DagNode {
    return joinIn(this, ONE, ZERO, [first, ...rest])
  }

  disjoin(first: DagNode, ...rest: DagNode[]): DagNode {
    return joinIn(this, ZERO, ONE, [first, ...rest])
  }

  restrict(node: DagNode, bindings: ReadonlyMap<number, boolean>): DagNode {
    return restrictIn(this, node, bindings)
  }
}
