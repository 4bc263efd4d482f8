import { TypeCoercionError } from "@keymap/errors"
import { type FieldType, fieldTypes, isIdentifier } from "@keymap/schema"

function check(value: unknown): string {
  const text = fieldTypes.ascii.decodeNative(value)

  if (!isIdentifier(text)) {
    throw new TypeCoercionError(`"${text}" is not a valid identifier`, {
      logicalType: "ascii",
      received: text,
    })
  }

  return text
}

/**
 * ASCII key type restricted to the store's identifier grammar, so map keys
 * can stand in for column names.
 */
export const identifierKey: FieldType<string> = {
  logicalType: "ascii",
  encodeNative: check,
  decodeNative: check,
  equals: (a, b) => a === b,
}
