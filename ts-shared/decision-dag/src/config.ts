import { Either, ParseResult, Schema } from 'effect'
import { ConfigError } from './errors.js'

/******************************************
            Environment schema
*******************************************/

const DebugFlag = Schema.Literal('1', '0', 'true', 'false')

export const DagEnv = Schema.Struct({
  DECISION_DAG_DEBUG: Schema.optional(DebugFlag),
  DECISION_DAG_LOG_PREFIX: Schema.optional(Schema.NonEmptyString),
}).annotations({
  identifier: 'DagEnv',
  description: 'Environment variables read by loadConfig',
})

export type DagEnv = Schema.Schema.Type<typeof DagEnv>

export interface DagConfig {
  /** Write debug log lines to the console */
  readonly debug: boolean
  readonly logPrefix: string
}

export const DEFAULT_CONFIG: DagConfig = {
  debug: false,
  logPrefix: 'decision-dag',
}

/** Decodes the relevant variables of `env`; other variables are ignored. */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): DagConfig {
  const decoded = Schema.decodeUnknownEither(DagEnv)({
    DECISION_DAG_DEBUG: env.DECISION_DAG_DEBUG,
    DECISION_DAG_LOG_PREFIX: env.DECISION_DAG_LOG_PREFIX,
  })
  if (Either.isLeft(decoded)) {
    throw new ConfigError(
      ParseResult.TreeFormatter.formatErrorSync(decoded.left)
    )
  }

  const { DECISION_DAG_DEBUG: debug, DECISION_DAG_LOG_PREFIX: prefix } =
    decoded.right
  return {
    debug: debug === '1' || debug === 'true',
    logPrefix: prefix ?? DEFAULT_CONFIG.logPrefix,
  }
}

/*************************
      Active config
**************************/

let active: DagConfig | undefined

/** Like loadConfig, but an invalid environment falls back to DEFAULT_CONFIG
 * with a warning. */
function loadConfigOrDefault(): DagConfig {
  try {
    return loadConfig()
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error
    console.warn(
      `[${DEFAULT_CONFIG.logPrefix}:config] invalid environment, using defaults`,
      error.message
    )
    return DEFAULT_CONFIG
  }
}

export function currentConfig(): DagConfig {
  if (active === undefined) active = loadConfigOrDefault()
  return active
}

export function configure(overrides: Partial<DagConfig>): DagConfig {
  active = { ...currentConfig(), ...overrides }
  return active
}

export function resetConfig(): DagConfig {
  active = loadConfigOrDefault()
  return active
}
