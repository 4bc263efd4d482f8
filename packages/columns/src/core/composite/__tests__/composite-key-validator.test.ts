import { TypeCoercionError, ValidationError } from "@keymap/errors"
import { createEntity, fieldTypes } from "@keymap/schema"
import { Contract, createTestRegistry } from "../../../tests/utils/models"
import { identifierKey } from "../../map/identifier-key"
import { MapColumn } from "../../map/map-column"
import { CompositeKeyCodec } from "../composite-key-codec"
import { CompositeKeyValidator } from "../composite-key-validator"

function createValidator(column = new MapColumn({ keyType: identifierKey, valueType: fieldTypes.text })) {
  const codec = new CompositeKeyCodec({ registry: createTestRegistry() }, { model: "Contract" })
  return new CompositeKeyValidator({ codec, column })
}

describe("CompositeKeyValidator", () => {
  it("maps empty input to an empty mapping", async () => {
    const validator = createValidator()

    await expect(validator.validate(null)).resolves.toEqual({})
    await expect(validator.validate({})).resolves.toEqual({})
  })

  it("reads the primary key of an entity", async () => {
    const entity = createEntity(Contract, {
      organization: "Acme",
      start_date: new Date(0),
      key: "c-1",
      amount: 3,
    })

    await expect(createValidator().validate(entity)).resolves.toEqual({
      organization: "Acme",
      start_date: "0",
      key: "c-1",
    })
  })

  it("refuses values that are neither entities nor plain objects", async () => {
    const validator = createValidator()

    await expect(validator.validate(new Date(0))).rejects.toThrow(
      'A composite key of "Contract" must be a plain object',
    )
    await expect(validator.validate("Acme")).rejects.toBeInstanceOf(TypeCoercionError)
  })

  it("runs the map column check last", async () => {
    const validator = createValidator(new MapColumn({ keyType: identifierKey, valueType: fieldTypes.ascii }))

    await expect(
      validator.validate({ organization: "Société", start_date: "0", key: "c-1" }),
    ).rejects.toBeInstanceOf(ValidationError)
  })
})
