export const logicalTypes = [
  "text",
  "ascii",
  "uuid",
  "timeuuid",
  "timestamp",
  "int",
  "bigint",
  "boolean",
  "double",
  "blob",
] as const

export type LogicalType = (typeof logicalTypes)[number]

/**
 * A value in the shape the store's driver accepts on write.
 */
export type WireValue = string | number | bigint | boolean | Uint8Array

/**
 * How one column type moves between application values and the driver.
 *
 * @remarks
 * Mirrors the driver's own marshaling, asymmetry included: `encodeNative`
 * produces the write shape, `decodeNative` accepts the read shape. For every
 * type usable in a primary key, `decodeNative` also accepts the canonical text
 * form of its own values.
 *
 * Both directions throw `TypeCoercionError` for values of the wrong shape.
 */
export interface FieldType<T> {
  readonly logicalType: LogicalType

  encodeNative(value: unknown): WireValue

  decodeNative(wire: unknown): T

  equals(a: T, b: T): boolean
}
