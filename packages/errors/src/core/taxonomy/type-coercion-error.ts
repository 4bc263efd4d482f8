import type { ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * A value cannot be encoded or decoded by its declared field type.
 *
 * @remarks
 * This is a caller/schema mismatch, never a transient condition.
 */
export class TypeCoercionError extends BaseError<"type_coercion_error"> {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, {
      code: "type_coercion_error",
      context,
      cause,
      isOperational: false,
    })
  }
}
