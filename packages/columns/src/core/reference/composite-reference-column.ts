import type { ModelRegistry } from "@keymap/schema"
import type { CompositeKeyValue, FlatStorageMapping, StoredMapping } from "../../ports/mapping"
import type { CompositeReference } from "../../ports/reference-column"
import type { ReferenceOptions } from "../../ports/reference-options"
import { CompositeKeyCodec } from "../composite/composite-key-codec"
import { CompositeKeyValidator } from "../composite/composite-key-validator"
import { MapColumn } from "../map/map-column"

export type CompositeReferenceColumnDeps = {
  registry: ModelRegistry
}

/**
 * Reference to an entity with a multi-field primary key, stored in a map
 * column of ASCII identifier keys and text values.
 *
 * Writes run the codec first and the map column last; reads run the map
 * column first and the codec last.
 */
export class CompositeReferenceColumn implements CompositeReference {
  readonly variant = "composite"
  readonly indexed = false
  readonly codec: CompositeKeyCodec
  private readonly column: MapColumn
  private readonly validator: CompositeKeyValidator

  constructor(deps: CompositeReferenceColumnDeps, options: ReferenceOptions) {
    this.codec = new CompositeKeyCodec(deps, options)
    this.column = new MapColumn({ keyType: this.codec.keyType, valueType: this.codec.valueType })
    this.validator = new CompositeKeyValidator({ codec: this.codec, column: this.column })
  }

  get model(): string {
    return this.codec.model
  }

  validate(value: unknown): Promise<FlatStorageMapping> {
    return this.validator.validate(value)
  }

  async toDatabase(value: unknown): Promise<StoredMapping | null> {
    return this.column.toDatabase(await this.validate(value))
  }

  async fromDatabase(raw: unknown): Promise<CompositeKeyValue> {
    return this.codec.decode(this.column.fromDatabase(raw))
  }
}
