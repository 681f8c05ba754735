import type { NodeStore } from './node-store.js'
import type { DagNode } from './node.js'
import { UnboundStoreError } from './errors.js'
import { createLogger } from './log.js'

/**********************************************
   Process-wide binding of the current store
***********************************************

Every bound-store operation (emplace, literal, invert, join, ...) interns
into whichever store is bound here. Rebinding is a flat swap: callers that
need to restore the previous binding keep the value `bind` returns, or use
`withStore`.
*/

const log = createLogger('sink')

let bound: NodeStore | undefined

/** Binds `store` (or nothing) and returns the store that was bound before. */
export function bind(store: NodeStore | undefined): NodeStore | undefined {
  const previous = bound
  bound = store
  log.debug(
    `bound ${store?.label ?? 'nothing'} (was ${previous?.label ?? 'nothing'})`
  )
  return previous
}

export function boundStore(operation = 'construct a node'): NodeStore {
  if (bound === undefined) throw new UnboundStoreError(operation)
  return bound
}

/** Runs `fn` with `store` bound, restoring the previous binding afterwards. */
export function withStore<T>(store: NodeStore, fn: () => T): T {
  const previous = bind(store)
  try {
    return fn()
  } finally {
    bind(previous)
  }
}

export function emplace(
  depth: number,
  negative: DagNode,
  positive: DagNode
): DagNode {
  return boundStore('emplace').emplace(depth, negative, positive)
}
