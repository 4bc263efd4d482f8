import { TypeCoercionError } from "@keymap/errors"
import type { FieldDefinition, LogicalType } from "@keymap/schema"

/**
 * Logical types whose text form round-trips exactly. Only these may be part
 * of a flattened key.
 */
export const KEY_COMPONENT_TYPES: ReadonlySet<LogicalType> = new Set<LogicalType>([
  "text",
  "ascii",
  "uuid",
  "timeuuid",
  "int",
  "bigint",
  "boolean",
  "timestamp",
])

const EPOCH_MILLIS = /^-?\d+$/

function coercionError(
  model: string,
  field: FieldDefinition,
  reason: string,
  cause?: unknown,
): TypeCoercionError {
  return new TypeCoercionError(
    `Field "${field.id}" of model "${model}": ${reason}`,
    { model, field: field.id, logicalType: field.type.logicalType },
    cause,
  )
}

function checkEpochMillis(model: string, field: FieldDefinition, text: string): void {
  if (!EPOCH_MILLIS.test(text)) {
    throw coercionError(model, field, `"${text}" is not an epoch milliseconds string`)
  }
  if (Number.isNaN(new Date(Number(text)).getTime())) {
    throw coercionError(model, field, `"${text}" is outside the supported timestamp range`)
  }
}

function assertKeyComponent(model: string, field: FieldDefinition): void {
  if (!KEY_COMPONENT_TYPES.has(field.type.logicalType)) {
    throw coercionError(model, field, `${field.type.logicalType} cannot be part of a flattened key`)
  }
}

function attempt<T>(model: string, field: FieldDefinition, fn: () => T): T {
  try {
    return fn()
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw coercionError(model, field, reason, err)
  }
}

/**
 * Turns one primary-key value into its canonical text.
 *
 * Text input is checked against the field type and kept as is, which makes
 * encoding an already flat mapping a no-op. Timestamps are written as integer
 * epoch milliseconds.
 *
 * @returns `null` for `null`, `undefined` and the empty string.
 */
export function encodeComponent(model: string, field: FieldDefinition, value: unknown): string | null {
  assertKeyComponent(model, field)

  if (value === null || value === undefined || value === "") return null

  const { type } = field

  if (typeof value === "string") {
    if (type.logicalType === "timestamp") {
      checkEpochMillis(model, field, value)
      return value
    }

    attempt(model, field, () => type.decodeNative(value))
    return value
  }

  const wire = attempt(model, field, () => type.encodeNative(value))
  const text = String(wire)

  return text === "" ? null : text
}

/**
 * Rebuilds a typed value from its stored text.
 *
 * The driver reads timestamps back as float seconds, which is what the
 * timestamp type decodes; stored milliseconds are converted first.
 */
export function decodeComponent(model: string, field: FieldDefinition, stored: unknown): unknown {
  assertKeyComponent(model, field)

  const { type } = field

  if (type.logicalType === "timestamp" && typeof stored === "string") {
    checkEpochMillis(model, field, stored)
    const seconds = Number(stored) / 1000
    return attempt(model, field, () => type.decodeNative(seconds))
  }

  return attempt(model, field, () => type.decodeNative(stored))
}
