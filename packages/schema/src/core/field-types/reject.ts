import { TypeCoercionError } from "@keymap/errors"
import type { LogicalType } from "../../ports/field-type"

function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (value instanceof Date) return "Date"
  if (value instanceof Uint8Array) return "Uint8Array"
  if (Array.isArray(value)) return "array"
  return typeof value
}

export function reject(logicalType: LogicalType, value: unknown, expected: string): TypeCoercionError {
  return new TypeCoercionError(
    `Cannot use ${describeValue(value)} as ${logicalType}: expected ${expected}`,
    { logicalType, received: describeValue(value) },
  )
}
