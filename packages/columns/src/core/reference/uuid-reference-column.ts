import { ConfigurationError, MissingFieldError, TypeCoercionError } from "@keymap/errors"
import {
  type FieldDefinition,
  fieldTypes,
  isEntity,
  isUuid,
  type ModelRegistry,
  type Uuid,
} from "@keymap/schema"
import { parseReferenceOptions, type ReferenceOptions } from "../../ports/reference-options"
import { SchemaResolver } from "../composite/schema-resolver"

export type UuidReferenceColumnDeps = {
  registry: ModelRegistry
}

export type UuidReferenceVariant = "simple" | "string_coerced"

/**
 * Stores the id of an entity whose primary key is a single UUID field.
 * `read` shapes the id handed back by `fromDatabase`.
 */
export class UuidReferenceColumn<V extends UuidReferenceVariant, TRead> {
  readonly variant: V
  readonly model: string
  readonly indexed: boolean
  private readonly resolver: SchemaResolver
  private readonly read: (id: Uuid) => TRead

  constructor(
    deps: UuidReferenceColumnDeps,
    variant: V,
    options: ReferenceOptions,
    read: (id: Uuid) => TRead,
  ) {
    const config = parseReferenceOptions(options)

    this.variant = variant
    this.model = config.model
    this.indexed = config.indexed
    this.resolver = new SchemaResolver(deps, config.model)
    this.read = read
  }

  async validate(value: unknown): Promise<Uuid | null> {
    if (value === null || value === undefined || value === "") return null

    const field = await this.keyField()

    if (!isEntity(value)) return this.toUuid(field, value)

    if (value.model !== this.model) {
      throw new TypeCoercionError(
        `Expected an instance of "${this.model}", got one of "${value.model}"`,
        { model: this.model, received: value.model },
      )
    }

    const id = value.get(field.id)
    if (id === null || id === undefined) {
      throw new MissingFieldError(this.model, field.id)
    }

    return this.toUuid(field, id)
  }

  toDatabase(value: unknown): Promise<Uuid | null> {
    return this.validate(value)
  }

  async fromDatabase(raw: unknown): Promise<TRead | null> {
    if (raw === null || raw === undefined) return null

    return this.read(fieldTypes.uuid.decodeNative(raw))
  }

  private async keyField(): Promise<FieldDefinition> {
    const schema = await this.resolver.resolve()
    const [field, ...rest] = schema.primaryKey

    if (
      !field ||
      rest.length > 0 ||
      (field.type.logicalType !== "uuid" && field.type.logicalType !== "timeuuid")
    ) {
      throw new ConfigurationError(`Model "${schema.name}" does not have a single UUID primary key`, {
        model: schema.name,
        primaryKey: schema.primaryKey.map((f) => f.id),
      })
    }

    return field
  }

  private toUuid(field: FieldDefinition, value: unknown): Uuid {
    const id = field.type.decodeNative(value)

    if (!isUuid(id)) {
      throw new TypeCoercionError(`Field "${field.id}" of model "${this.model}" did not yield a UUID`, {
        model: this.model,
        field: field.id,
        logicalType: field.type.logicalType,
      })
    }

    return id
  }
}
