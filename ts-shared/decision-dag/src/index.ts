export {
  ZERO,
  ONE,
  TERMINAL_DEPTH,
  VariableIndex,
  isTerminal,
  constant,
  type DagNode,
  type DecisionNode,
  type TerminalNode,
  type NodeId,
} from './node.js'
export { NodeStore } from './node-store.js'
export { bind, boundStore, withStore, emplace } from './sink.js'
export { literal, literalIn } from './literal.js'
export { invert, invertIn, type InvertCache } from './invert.js'
export {
  join,
  joinIn,
  joinPair,
  conjoin,
  disjoin,
  combine,
  newJoinCache,
  type JoinCache,
} from './join.js'
export {
  evaluate,
  restrict,
  restrictIn,
  support,
  nodeCount,
  render,
} from './inspect.js'
export {
  loadConfig,
  configure,
  currentConfig,
  resetConfig,
  DEFAULT_CONFIG,
  DagEnv,
  type DagConfig,
} from './config.js'
export { createLogger, type Logger } from './log.js'
export {
  DecisionDagError,
  UnboundStoreError,
  InvalidDepthError,
  UnassignedVariableError,
  ConfigError,
} from './errors.js'
