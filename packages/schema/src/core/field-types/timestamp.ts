import type { FieldType } from "../../ports/field-type"
import { reject } from "./reject"

const IN_RANGE = "epoch milliseconds within ±8.64e15"

function toDate(ms: number): Date | undefined {
  const date = new Date(ms)
  return Number.isNaN(date.getTime()) ? undefined : date
}

/**
 * Timestamps are written as integer milliseconds since epoch; anything below
 * a millisecond is truncated, as the driver does. Instants a `Date` cannot
 * hold are refused both ways.
 *
 * On read the driver hands back float seconds with millisecond precision, so
 * `decodeNative` takes seconds. A `Date` is accepted in both directions.
 */
export const timestamp: FieldType<Date> = {
  logicalType: "timestamp",

  encodeNative(value) {
    if (value instanceof Date && Number.isFinite(value.getTime())) return value.getTime()
    if (typeof value === "number" && Number.isFinite(value)) {
      const date = toDate(Math.trunc(value))
      if (date) return date.getTime()
      throw reject("timestamp", value, IN_RANGE)
    }

    throw reject("timestamp", value, "a valid Date or epoch milliseconds")
  },

  decodeNative(wire) {
    if (wire instanceof Date && Number.isFinite(wire.getTime())) return new Date(wire.getTime())
    if (typeof wire === "number" && Number.isFinite(wire)) {
      // seconds * 1000 is not exact in floating point
      const date = toDate(Math.round(wire * 1000))
      if (date) return date
      throw reject("timestamp", wire, IN_RANGE)
    }

    throw reject("timestamp", wire, "a valid Date or epoch seconds")
  },

  equals: (a, b) => a.getTime() === b.getTime(),
}
