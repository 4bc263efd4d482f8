import {
  ConfigurationError,
  MissingFieldError,
  SchemaResolutionError,
  TypeCoercionError,
  UnexpectedFieldError,
} from "@keymap/errors"
import { createEntity } from "@keymap/schema"
import {
  Account,
  ACCOUNT_ID,
  Contract,
  createTestRegistry,
  STREAM_ID,
} from "../../../tests/utils/models"
import { CompositeKeyCodec } from "../composite-key-codec"

const contractKey = {
  organization: "Acme",
  start_date: new Date("2024-01-01T00:00:00.123Z"),
  key: "c-1",
}

const storedContractKey = {
  organization: "Acme",
  start_date: "1704067200123",
  key: "c-1",
}

describe("CompositeKeyCodec (behavior)", () => {
  let codec: CompositeKeyCodec

  beforeEach(() => {
    codec = new CompositeKeyCodec({ registry: createTestRegistry() }, { model: "Contract" })
  })

  describe("configuration", () => {
    it("fixes key and value types", () => {
      expect(codec.keyType.logicalType).toBe("ascii")
      expect(codec.valueType.logicalType).toBe("text")
    })

    it("refuses a secondary index", () => {
      expect(
        () => new CompositeKeyCodec({ registry: createTestRegistry() }, { model: "Contract", index: true }),
      ).toThrow(ConfigurationError)
    })

    it("refuses an empty model name", () => {
      expect(() => new CompositeKeyCodec({ registry: createTestRegistry() }, { model: "" })).toThrow(
        "No model provided",
      )
    })

    it("accepts an explicit index: false", () => {
      const plain = new CompositeKeyCodec({ registry: createTestRegistry() }, { model: "Contract", index: false })

      expect(plain.model).toBe("Contract")
    })
  })

  describe("encode", () => {
    it("maps empty input to an empty mapping", async () => {
      await expect(codec.encode(null)).resolves.toEqual({})
      await expect(codec.encode(undefined)).resolves.toEqual({})
      await expect(codec.encode({})).resolves.toEqual({})
    })

    it("flattens a composite key value", async () => {
      await expect(codec.encode(contractKey)).resolves.toEqual(storedContractKey)
    })

    it("truncates fractional milliseconds", async () => {
      const mapping = await codec.encode({ ...contractKey, start_date: 1704067200123.456 })

      expect(mapping.start_date).toBe("1704067200123")
    })

    it("leaves an already flat mapping unchanged", async () => {
      const once = await codec.encode(contractKey)
      const twice = await codec.encode(once)

      expect(twice).toEqual(once)
    })

    it("reads the primary key of an entity", async () => {
      const entity = createEntity(Contract, { ...contractKey, amount: 100 })

      await expect(codec.encode(entity)).resolves.toEqual(storedContractKey)
    })

    it("refuses an entity of another model", async () => {
      const account = createEntity(Account, { id: ACCOUNT_ID })

      await expect(codec.encode(account)).rejects.toThrow(
        'Expected an instance of "Contract", got one of "Account"',
      )
    })

    it("fails on an entity with an unset key component", async () => {
      const entity = createEntity(Contract, { organization: "Acme", key: "c-1" })

      await expect(codec.encode(entity)).rejects.toThrow(
        'Missing primary key component "start_date" of model "Contract"',
      )
    })

    it("refuses a timestamp a Date cannot hold", async () => {
      await expect(codec.encode({ ...contractKey, start_date: 1e17 })).rejects.toBeInstanceOf(
        TypeCoercionError,
      )
    })

    it("fails on a missing component", async () => {
      await expect(codec.encode({ organization: "Acme", key: "c-1" })).rejects.toThrow(
        'Missing primary key component "start_date" of model "Contract"',
      )
    })

    it("fails on an empty text component", async () => {
      await expect(codec.encode({ ...contractKey, key: "" })).rejects.toBeInstanceOf(MissingFieldError)
    })

    it("fails on fields outside the primary key", async () => {
      await expect(codec.encode({ ...contractKey, amount: 100 })).rejects.toThrow(
        'Fields "amount" are not part of model "Contract"',
      )
    })

    it("does not resolve the schema for empty input", async () => {
      const ghost = new CompositeKeyCodec({ registry: createTestRegistry() }, { model: "Ghost" })

      await expect(ghost.encode(null)).resolves.toEqual({})
      await expect(ghost.encode({ a: "1" })).rejects.toBeInstanceOf(SchemaResolutionError)
    })
  })

  describe("decode", () => {
    it("maps an empty mapping to an empty value", async () => {
      await expect(codec.decode({})).resolves.toEqual({})
      await expect(codec.decode(null)).resolves.toEqual({})
    })

    it("rebuilds typed values", async () => {
      await expect(codec.decode(storedContractKey)).resolves.toEqual(contractKey)
    })

    it("fails on a missing component", async () => {
      await expect(codec.decode({ organization: "Acme" })).rejects.toBeInstanceOf(MissingFieldError)
    })

    it("fails on a null component", async () => {
      await expect(codec.decode({ ...storedContractKey, key: null })).rejects.toThrow(
        'Missing primary key component "key" of model "Contract"',
      )
    })

    it("fails on unknown keys", async () => {
      await expect(codec.decode({ ...storedContractKey, region: "eu" })).rejects.toBeInstanceOf(
        UnexpectedFieldError,
      )
    })

    it("fails on stored milliseconds a Date cannot hold", async () => {
      await expect(
        codec.decode({ ...storedContractKey, start_date: "99999999999999999" }),
      ).rejects.toThrow(
        'Field "start_date" of model "Contract": "99999999999999999" is outside the supported timestamp range',
      )
    })

    it("fails on text its field type cannot read", async () => {
      await expect(codec.decode({ ...storedContractKey, start_date: "yesterday" })).rejects.toBeInstanceOf(
        TypeCoercionError,
      )
    })
  })

  describe("round trip", () => {
    it("restores every key component type", async () => {
      const events = new CompositeKeyCodec({ registry: createTestRegistry() }, { model: "Event" })
      const value = { stream: STREAM_ID, seq: 9007199254740993n, shard: 0, replayed: false }

      const mapping = await events.encode(value)

      expect(mapping).toEqual({
        stream: STREAM_ID,
        seq: "9007199254740993",
        shard: "0",
        replayed: "false",
      })
      await expect(events.decode(mapping)).resolves.toEqual(value)
    })

    it("restores timestamps at millisecond precision", async () => {
      const decoded = await codec.decode(await codec.encode({ ...contractKey, start_date: 1704067200123.456 }))

      expect(decoded.start_date).toEqual(new Date("2024-01-01T00:00:00.123Z"))
    })

    it("refuses models with a double in the key", async () => {
      const measurements = new CompositeKeyCodec({ registry: createTestRegistry() }, { model: "Measurement" })

      await expect(measurements.encode({ sensor: "s1", reading: 1.5 })).rejects.toBeInstanceOf(
        TypeCoercionError,
      )
    })
  })

  describe("schema resolution", () => {
    it("resolves once for concurrent first use", async () => {
      const registry = createTestRegistry()
      const resolve = vi.spyOn(registry, "resolve")
      const shared = new CompositeKeyCodec({ registry }, { model: "Contract" })

      await Promise.all([
        shared.encode(contractKey),
        shared.decode(storedContractKey),
        shared.schema(),
      ])

      expect(resolve).toHaveBeenCalledTimes(1)
    })

    it("exposes the resolved schema", async () => {
      await expect(codec.schema()).resolves.toBe(Contract)
    })
  })
})
