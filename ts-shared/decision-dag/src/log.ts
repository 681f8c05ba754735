import { currentConfig } from './config.js'

export interface Logger {
  debug(message: string, ...details: unknown[]): void
}

/** Console logger in the `[prefix:scope] message` format.
 * Silent unless the active config has `debug` set. */
export function createLogger(scope: string): Logger {
  return {
    debug(message, ...details) {
      const { debug, logPrefix } = currentConfig()
      if (!debug) return
      console.log(`[${logPrefix}:${scope}] ${message}`, ...details)
    },
  }
}
