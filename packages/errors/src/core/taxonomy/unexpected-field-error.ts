import { BaseError } from "../base-error"

export class UnexpectedFieldError extends BaseError<"unexpected_field"> {
  constructor(model: string, fields: readonly string[]) {
    super(`Fields ${fields.map((f) => `"${f}"`).join(", ")} are not part of model "${model}"`, {
      code: "unexpected_field",
      context: { model, fields: [...fields] },
    })
  }
}
