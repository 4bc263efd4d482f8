import { BaseError } from "../base-error"

export class SchemaResolutionError extends BaseError<"schema_resolution_error"> {
  constructor(model: string, cause?: unknown) {
    super(`Unknown model "${model}"`, {
      code: "schema_resolution_error",
      context: { model },
      cause,
      isOperational: false,
    })
  }
}
