import type { ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

type IssueLike = {
  path: readonly PropertyKey[]
  message: string
}

export type ValidationIssue = { path: string; message: string }

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

/**
 * Raised by the storage-layer map column when a mapping has the wrong shape
 * (not an object, a key outside the key type, a non-text value).
 */
export class ValidationError extends BaseError<"validation_error"> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: "validation_error", context })
  }

  static fromIssues(issues: readonly IssueLike[]): ValidationError {
    const formatted: ValidationIssue[] = issues.map((i) => ({
      path: formatPath(i.path),
      message: i.message,
    }))

    return new ValidationError(formatted[0]?.message ?? "Invalid value", {
      issues: formatted,
    })
  }
}
