import { match } from 'ts-pattern'
import { ONE, ZERO } from './node.js'
import type { DagNode } from './node.js'
import type { NodeStore } from './node-store.js'
import { boundStore } from './sink.js'
import { createLogger } from './log.js'

const log = createLogger('invert')

export type InvertCache = Map<DagNode, DagNode>

function invertNode(
  store: NodeStore,
  cache: InvertCache,
  node: DagNode
): DagNode {
  return match<DagNode, DagNode>(node)
    .with({ kind: 'terminal' }, (t) => (t === ZERO ? ONE : ZERO))
    .with({ kind: 'decision' }, (d) => {
      const existing = cache.get(d)
      if (existing !== undefined) return existing
      const res = store.emplace(
        d.depth,
        invertNode(store, cache, d.negative),
        invertNode(store, cache, d.positive)
      )
      cache.set(d, res)
      return res
    })
    .exhaustive()
}

/** The complement of `node`, built in `store`. Each node reachable from
 * `node` is visited once, however many paths lead to it. */
export function invertIn(store: NodeStore, node: DagNode): DagNode {
  const cache: InvertCache = new Map()
  const res = invertNode(store, cache, node)
  log.debug(`inverted in ${store.label}, memo size ${cache.size}`)
  return res
}

export function invert(node: DagNode): DagNode {
  return invertIn(boundStore('invert'), node)
}
