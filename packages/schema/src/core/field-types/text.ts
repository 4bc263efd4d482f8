import type { FieldType } from "../../ports/field-type"
import { reject } from "./reject"

const ASCII = /^[\x00-\x7F]*$/

export const text: FieldType<string> = {
  logicalType: "text",

  encodeNative(value) {
    if (typeof value !== "string") throw reject("text", value, "a string")
    return value
  },

  decodeNative(wire) {
    if (typeof wire !== "string") throw reject("text", wire, "a string")
    return wire
  },

  equals: (a, b) => a === b,
}

export const ascii: FieldType<string> = {
  logicalType: "ascii",

  encodeNative(value) {
    if (typeof value !== "string" || !ASCII.test(value)) {
      throw reject("ascii", value, "an ASCII string")
    }
    return value
  },

  decodeNative(wire) {
    if (typeof wire !== "string" || !ASCII.test(wire)) {
      throw reject("ascii", wire, "an ASCII string")
    }
    return wire
  },

  equals: (a, b) => a === b,
}
