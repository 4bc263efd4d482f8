import type { FieldType } from "../../ports/field-type"
import { reject } from "./reject"

export const boolean: FieldType<boolean> = {
  logicalType: "boolean",

  encodeNative(value) {
    if (typeof value !== "boolean") throw reject("boolean", value, "a boolean")
    return value
  },

  decodeNative(wire) {
    if (typeof wire === "boolean") return wire
    if (wire === "true") return true
    if (wire === "false") return false

    throw reject("boolean", wire, 'a boolean, "true" or "false"')
  },

  equals: (a, b) => a === b,
}
