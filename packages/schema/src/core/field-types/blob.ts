import type { FieldType } from "../../ports/field-type"
import { reject } from "./reject"

export const blob: FieldType<Uint8Array> = {
  logicalType: "blob",

  encodeNative(value) {
    if (!(value instanceof Uint8Array)) throw reject("blob", value, "a Uint8Array")
    return value
  },

  decodeNative(wire) {
    if (!(wire instanceof Uint8Array)) throw reject("blob", wire, "a Uint8Array")
    return new Uint8Array(wire)
  },

  equals: (a, b) => a.length === b.length && a.every((byte, i) => byte === b[i]),
}
