import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit; "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Pretty-print for local runs. Leave off where logs are shipped as JSON.
   */
  prettify?: boolean
}
