/*************************************************
 ***************** Error hierarchy ***************
 *************************************************/

export class DecisionDagError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Construction was attempted while no NodeStore was bound.
 * This is a caller-side protocol violation, never a recoverable condition. */
export class UnboundStoreError extends DecisionDagError {
  constructor(operation: string) {
    super(`Cannot ${operation}: no node store is bound`)
  }
}

export class InvalidDepthError extends DecisionDagError {
  constructor(readonly depth: unknown) {
    super(`Invalid depth ${String(depth)}: expected a non-negative integer`)
  }
}

export class UnassignedVariableError extends DecisionDagError {
  constructor(readonly variableIndex: number) {
    super(`No value assigned to variable x${variableIndex}`)
  }
}

export class ConfigError extends DecisionDagError {}
