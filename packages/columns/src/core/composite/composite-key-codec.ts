import {
  ConfigurationError,
  MissingFieldError,
  TypeCoercionError,
  UnexpectedFieldError,
} from "@keymap/errors"
import { type FieldType, fieldTypes, isEntity, type ModelRegistry, type ModelSchema } from "@keymap/schema"
import type { CompositeKeyValue, FlatStorageMapping, KeyInput } from "../../ports/mapping"
import { parseReferenceOptions, type ReferenceOptions } from "../../ports/reference-options"
import { identifierKey } from "../map/identifier-key"
import { isPlainObject } from "./plain-object"
import { SchemaResolver } from "./schema-resolver"
import { decodeComponent, encodeComponent } from "./value-normalizer"

export type CompositeKeyCodecDeps = {
  registry: ModelRegistry
}

/**
 * Flattens the composite primary key of a referenced model into a map of
 * field id to text, and back.
 *
 * @remarks
 * Both directions walk the primary key of the resolved schema, never the
 * keys of the input. The schema is resolved on first use.
 *
 * @example
 * ```ts
 * const codec = new CompositeKeyCodec({ registry }, { model: "Contract" })
 *
 * await codec.encode({ organization: "Acme", start_date: new Date(0), key: "c-1" })
 * // { organization: "Acme", start_date: "0", key: "c-1" }
 * ```
 */
export class CompositeKeyCodec {
  readonly keyType: FieldType<string> = identifierKey
  readonly valueType: FieldType<string> = fieldTypes.text
  readonly model: string
  private readonly resolver: SchemaResolver

  /**
   * @throws ConfigurationError when `model` is missing or `index` is set.
   */
  constructor(deps: CompositeKeyCodecDeps, options: ReferenceOptions) {
    const config = parseReferenceOptions(options)

    if (config.indexed) {
      throw new ConfigurationError("Secondary indexes on composite references are not allowed", {
        model: config.model,
      })
    }

    this.model = config.model
    this.resolver = new SchemaResolver(deps, config.model)
  }

  schema(): Promise<ModelSchema> {
    return this.resolver.resolve()
  }

  async encode(value: KeyInput): Promise<FlatStorageMapping> {
    if (value === null || value === undefined) return {}

    if (isEntity(value)) {
      const schema = await this.schema()

      if (value.model !== schema.name) {
        throw new TypeCoercionError(
          `Expected an instance of "${schema.name}", got one of "${value.model}"`,
          { model: schema.name, received: value.model },
        )
      }

      return flatten(schema, value.primaryKey())
    }

    if (!isPlainObject(value)) {
      throw new TypeCoercionError(`A composite key of "${this.model}" must be a plain object`, {
        model: this.model,
      })
    }

    if (Object.keys(value).length === 0) return {}

    return flatten(await this.schema(), value)
  }

  async decode(mapping: FlatStorageMapping | null | undefined): Promise<CompositeKeyValue> {
    if (!mapping || Object.keys(mapping).length === 0) return {}

    const schema = await this.schema()
    assertKnownFields(schema, Object.keys(mapping))

    const out: Record<string, unknown> = {}

    for (const field of schema.primaryKey) {
      const stored = mapping[field.id]
      if (stored === undefined || stored === null || stored === "") {
        throw new MissingFieldError(schema.name, field.id)
      }
      out[field.id] = decodeComponent(schema.name, field, stored)
    }

    return out
  }
}

function assertKnownFields(schema: ModelSchema, keys: readonly string[]): void {
  const known = new Set(schema.primaryKey.map((f) => f.id))
  const extra = keys.filter((k) => !known.has(k))

  if (extra.length > 0) {
    throw new UnexpectedFieldError(schema.name, extra)
  }
}

function flatten(schema: ModelSchema, value: CompositeKeyValue): FlatStorageMapping {
  assertKnownFields(schema, Object.keys(value))

  const out: Record<string, string> = {}

  for (const field of schema.primaryKey) {
    const text = encodeComponent(schema.name, field, value[field.id])
    if (text === null) {
      throw new MissingFieldError(schema.name, field.id)
    }
    out[field.id] = text
  }

  return out
}
