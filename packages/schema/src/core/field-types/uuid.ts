import { validate, version } from "uuid"
import type { FieldType, LogicalType } from "../../ports/field-type"
import { reject } from "./reject"

/**
 * A UUID in canonical lowercase form.
 */
export type Uuid = string & { readonly __brand: "Uuid" }

export function isUuid(value: unknown): value is Uuid {
  return typeof value === "string" && validate(value) && value === value.toLowerCase()
}

function toUuid(logicalType: LogicalType, value: unknown, requiredVersion?: number): Uuid {
  const lower = typeof value === "string" ? value.toLowerCase() : undefined

  if (!isUuid(lower)) throw reject(logicalType, value, "a UUID string")

  if (requiredVersion !== undefined && version(lower) !== requiredVersion) {
    throw reject(logicalType, value, `a version ${requiredVersion} UUID`)
  }

  return lower
}

export const uuid: FieldType<Uuid> = {
  logicalType: "uuid",
  encodeNative: (value) => toUuid("uuid", value),
  decodeNative: (wire) => toUuid("uuid", wire),
  equals: (a, b) => a === b,
}

export const timeuuid: FieldType<Uuid> = {
  logicalType: "timeuuid",
  encodeNative: (value) => toUuid("timeuuid", value, 1),
  decodeNative: (wire) => toUuid("timeuuid", wire, 1),
  equals: (a, b) => a === b,
}
