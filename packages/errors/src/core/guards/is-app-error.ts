import type { AppError, ErrorCode } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard for errors raised by this library, or anything shaped like them.
 *
 * @example
 * ```ts
 * try {
 *   await codec.decode(stored)
 * } catch (err) {
 *   if (isAppError(err) && err.code === "missing_field") {
 *     logger.warn("stale reference", { err })
 *   }
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error) || !("code" in e)) return false

  const fields: Record<string, unknown> = { ...e }

  return (
    typeof e.code === "string" &&
    isRecord(fields.context) &&
    typeof fields.isRetryable === "boolean" &&
    typeof fields.isOperational === "boolean" &&
    isValidDate(fields.timestamp)
  )
}

/**
 * Narrows to an `AppError` carrying one specific code.
 */
export function hasErrorCode<C extends ErrorCode>(
  e: unknown,
  code: C,
): e is AppError & { readonly code: C } {
  return isAppError(e) && e.code === code
}
