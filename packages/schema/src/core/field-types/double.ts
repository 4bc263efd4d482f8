import type { FieldType } from "../../ports/field-type"
import { reject } from "./reject"

export const double: FieldType<number> = {
  logicalType: "double",

  encodeNative(value) {
    if (typeof value !== "number" || Number.isNaN(value)) throw reject("double", value, "a number")
    return value
  },

  decodeNative(wire) {
    const n = typeof wire === "string" && wire.trim() !== "" ? Number(wire) : wire
    if (typeof n !== "number" || Number.isNaN(n)) throw reject("double", wire, "a number")
    return n
  },

  equals: (a, b) => Object.is(a, b),
}
