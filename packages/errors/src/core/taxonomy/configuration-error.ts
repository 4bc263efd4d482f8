import type { ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * A column or model definition that can never work: missing `model`, an index
 * requested on a composite reference, a field id outside the identifier
 * grammar, invalid settings.
 *
 * @remarks
 * Raised at definition time, before anything is written.
 */
export class ConfigurationError extends BaseError<"configuration_error"> {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, {
      code: "configuration_error",
      context,
      cause,
      isOperational: false,
    })
  }
}
