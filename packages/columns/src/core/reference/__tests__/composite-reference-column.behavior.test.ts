import { ConfigurationError, MissingFieldError, ValidationError } from "@keymap/errors"
import { createEntity } from "@keymap/schema"
import { MemoryWideColumnTable } from "../../../tests/utils/memory-wide-column-table"
import { Contract, createTestRegistry } from "../../../tests/utils/models"
import { CompositeReferenceColumn } from "../composite-reference-column"

const stored = {
  organization: "Acme",
  start_date: "1704067200123",
  key: "c-1",
}

describe("CompositeReferenceColumn (behavior)", () => {
  let column: CompositeReferenceColumn

  beforeEach(() => {
    column = new CompositeReferenceColumn({ registry: createTestRegistry() }, { model: "Contract" })
  })

  it("describes itself", () => {
    expect(column.variant).toBe("composite")
    expect(column.model).toBe("Contract")
    expect(column.indexed).toBe(false)
  })

  it("cannot be indexed", () => {
    expect(
      () =>
        new CompositeReferenceColumn({ registry: createTestRegistry() }, { model: "Contract", index: true }),
    ).toThrow("Secondary indexes on composite references are not allowed")
  })

  it("requires a model", () => {
    expect(() => new CompositeReferenceColumn({ registry: createTestRegistry() }, { model: "" })).toThrow(
      ConfigurationError,
    )
  })

  describe("toDatabase", () => {
    it("writes nothing for an empty reference", async () => {
      await expect(column.toDatabase(null)).resolves.toBeNull()
      await expect(column.toDatabase({})).resolves.toBeNull()
    })

    it("writes the flattened key of an entity", async () => {
      const contract = createEntity(Contract, {
        organization: "Acme",
        start_date: new Date("2024-01-01T00:00:00.123Z"),
        key: "c-1",
        amount: 100,
      })

      await expect(column.toDatabase(contract)).resolves.toEqual(stored)
    })
  })

  describe("fromDatabase", () => {
    it("reads a missing map as an empty reference", async () => {
      await expect(column.fromDatabase(null)).resolves.toEqual({})
    })

    it("rebuilds the typed key", async () => {
      await expect(column.fromDatabase(stored)).resolves.toEqual({
        organization: "Acme",
        start_date: new Date("2024-01-01T00:00:00.123Z"),
        key: "c-1",
      })
    })

    it("fails when a stored component is gone", async () => {
      await expect(column.fromDatabase({ organization: "Acme" })).rejects.toBeInstanceOf(
        MissingFieldError,
      )
    })

    it("checks the map shape before decoding", async () => {
      await expect(column.fromDatabase({ "start-date": "1" })).rejects.toBeInstanceOf(ValidationError)
    })
  })

  describe("against a table", () => {
    it("finds the referenced entity from the stored mapping", async () => {
      const contracts = new MemoryWideColumnTable(Contract)
      const contract = createEntity(Contract, {
        organization: "Acme",
        start_date: new Date("2024-01-01T00:00:00.123Z"),
        key: "c-1",
        amount: 100,
      })
      contracts.insert(contract)
      contracts.insert(createEntity(Contract, { ...contract.toJSON(), key: "c-2", amount: 7 }))

      const raw = await column.toDatabase(contract)
      const found = contracts.find(await column.fromDatabase(raw))

      expect(contracts.size).toBe(2)
      expect(found?.toJSON()).toEqual(contract.toJSON())
    })

    it("truncates a sub-millisecond timestamp once and only once", async () => {
      const raw = await column.toDatabase({
        organization: "Acme",
        start_date: 1704067200123.456,
        key: "c-1",
      })

      expect(raw).toEqual(stored)

      const key = await column.fromDatabase(raw)

      expect(key.start_date).toEqual(new Date("2024-01-01T00:00:00.123Z"))
    })

    it("reads timestamps back from the table as float seconds", () => {
      const contracts = new MemoryWideColumnTable(Contract)
      contracts.insert(
        createEntity(Contract, {
          organization: "Acme",
          start_date: new Date("2024-01-01T00:00:00.123Z"),
          key: "c-1",
        }),
      )

      const row = contracts.select({
        organization: "Acme",
        start_date: new Date("2024-01-01T00:00:00.123Z"),
        key: "c-1",
      })

      expect(row?.start_date).toBeCloseTo(1704067200.123, 3)
    })
  })
})
