import { BaseError } from "../base-error"

/**
 * A composite key value, entity or stored mapping lacks a primary-key
 * component of the referenced model. Usually means the stored data and the
 * model definition have drifted apart.
 */
export class MissingFieldError extends BaseError<"missing_field"> {
  constructor(model: string, field: string) {
    super(`Missing primary key component "${field}" of model "${model}"`, {
      code: "missing_field",
      context: { model, field },
    })
  }
}
