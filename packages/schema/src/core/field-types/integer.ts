import type { FieldType } from "../../ports/field-type"
import { reject } from "./reject"

const INTEGER_TEXT = /^-?\d+$/
const INT32_MIN = -(2 ** 31)
const INT32_MAX = 2 ** 31 - 1

function isInt32(value: unknown): value is number {
  return Number.isInteger(value) && Number(value) >= INT32_MIN && Number(value) <= INT32_MAX
}

export const int: FieldType<number> = {
  logicalType: "int",

  encodeNative(value) {
    if (!isInt32(value)) throw reject("int", value, "a 32-bit integer")
    return value
  },

  decodeNative(wire) {
    const n = typeof wire === "string" && INTEGER_TEXT.test(wire) ? Number(wire) : wire
    if (!isInt32(n)) throw reject("int", wire, "a 32-bit integer")
    return n
  },

  equals: (a, b) => a === b,
}

export const bigint: FieldType<bigint> = {
  logicalType: "bigint",

  encodeNative(value) {
    if (typeof value === "bigint") return value
    if (Number.isSafeInteger(value)) return BigInt(Number(value))

    throw reject("bigint", value, "a bigint or safe integer")
  },

  decodeNative(wire) {
    if (typeof wire === "bigint") return wire
    if (typeof wire === "string" && INTEGER_TEXT.test(wire)) return BigInt(wire)
    if (Number.isSafeInteger(wire)) return BigInt(Number(wire))

    throw reject("bigint", wire, "a bigint, safe integer or integer string")
  },

  equals: (a, b) => a === b,
}
