import { ONE, ZERO, isVariableIndex } from './node.js'
import type { DagNode } from './node.js'
import type { NodeStore } from './node-store.js'
import { InvalidDepthError } from './errors.js'
import { boundStore } from './sink.js'

/** The function `x<variableIndex> == sign`: ONE on the branch matching `sign`, ZERO on the other. */
export function literalIn(
  store: NodeStore,
  variableIndex: number,
  sign: boolean
): DagNode {
  if (!isVariableIndex(variableIndex)) {
    throw new InvalidDepthError(variableIndex)
  }
  return store.emplace(variableIndex, sign ? ZERO : ONE, sign ? ONE : ZERO)
}

export function literal(variableIndex: number, sign: boolean): DagNode {
  return literalIn(boundStore('build a literal'), variableIndex, sign)
}
