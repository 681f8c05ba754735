import { Schema } from 'effect'

/**********************
      Node types
************************/

export type NodeId = number

export interface TerminalNode {
  readonly kind: 'terminal'
  readonly id: NodeId
  readonly value: 0 | 1
  readonly depth: number
}

/** An internal node. `depth` is the index of the variable it decides on. */
export interface DecisionNode {
  readonly kind: 'decision'
  /** Process-unique; orders operand pairs and keys the interning table */
  readonly id: NodeId
  readonly depth: number
  /** Selected when the variable is false */
  readonly negative: DagNode
  /** Selected when the variable is true */
  readonly positive: DagNode
}

export type DagNode = TerminalNode | DecisionNode

/** Deeper than any variable, so the alignment step in join never splits a terminal. */
export const TERMINAL_DEPTH = Number.POSITIVE_INFINITY

/** A variable index, and the depth of every decision node */
export const VariableIndex = Schema.Number.pipe(
  Schema.int(),
  Schema.nonNegative()
).annotations({ identifier: 'VariableIndex' })

export const isVariableIndex = Schema.is(VariableIndex)

/****************************
      Terminal sentinels
*****************************/

export const ZERO: TerminalNode = Object.freeze<TerminalNode>({
  kind: 'terminal',
  id: 0,
  value: 0,
  depth: TERMINAL_DEPTH,
})

export const ONE: TerminalNode = Object.freeze<TerminalNode>({
  kind: 'terminal',
  id: 1,
  value: 1,
  depth: TERMINAL_DEPTH,
})

let nextId: NodeId = 2

export function freshNodeId(): NodeId {
  return nextId++
}

export function isTerminal(node: DagNode): node is TerminalNode {
  return node === ZERO || node === ONE
}

export function constant(value: boolean): TerminalNode {
  return value ? ONE : ZERO
}
