import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit; anything below is dropped.
   */
  level: LogLevelName

  /**
   * Human-readable output through pino-pretty. Meant for local development;
   * leave off wherever logs are ingested as JSON.
   */
  prettify?: boolean
}
