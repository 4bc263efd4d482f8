export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export { ConfigurationError } from "./core/taxonomy/configuration-error"
export { MissingFieldError } from "./core/taxonomy/missing-field-error"
export { SchemaResolutionError } from "./core/taxonomy/schema-resolution-error"
export { TypeCoercionError } from "./core/taxonomy/type-coercion-error"
export { UnexpectedFieldError } from "./core/taxonomy/unexpected-field-error"
export { ValidationError, type ValidationIssue } from "./core/taxonomy/validation-error"
export type {
  AppError,
  ErrorCode,
  ErrorContext,
  KeymapErrorCode,
  SerializedError,
} from "./ports/error"
export { hasErrorCode, isAppError } from "./core/guards/is-app-error"
