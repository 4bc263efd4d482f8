/**
 * Codes carried by every error raised while defining, writing or reading
 * relation columns.
 */
export type KeymapErrorCode =
  | "configuration_error"
  | "schema_resolution_error"
  | "missing_field"
  | "unexpected_field"
  | "type_coercion_error"
  | "validation_error"

export type ErrorCode = KeymapErrorCode | "unknown"

/**
 * Structured metadata attached to an error (model name, field id, logical
 * type...). Kept out of the message so callers can match on it.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * Always `false` for this library: a column error is either a definition
   * bug or data/schema drift, and repeating the call gives the same outcome.
   */
  readonly isRetryable: boolean

  /**
   * `true` for failures caused by the data being written or read (a missing
   * key component), `false` for programmer errors (a bad column definition,
   * a value of the wrong type for its field).
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe shape of an error, used for logging.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
