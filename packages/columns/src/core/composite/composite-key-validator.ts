import { TypeCoercionError } from "@keymap/errors"
import { isEntity } from "@keymap/schema"
import type { FlatStorageMapping } from "../../ports/mapping"
import type { MapColumn } from "../map/map-column"
import type { CompositeKeyCodec } from "./composite-key-codec"
import { isPlainObject } from "./plain-object"

export type CompositeKeyValidatorDeps = {
  codec: CompositeKeyCodec
  column: MapColumn
}

/**
 * Normalizes whatever a composite reference is given into a flat mapping,
 * then lets the map column check the result.
 */
export class CompositeKeyValidator {
  private readonly codec: CompositeKeyCodec
  private readonly column: MapColumn

  constructor(deps: CompositeKeyValidatorDeps) {
    this.codec = deps.codec
    this.column = deps.column
  }

  async validate(value: unknown): Promise<FlatStorageMapping> {
    if (value === null || value === undefined || isEntity(value) || isPlainObject(value)) {
      return this.column.validate(await this.codec.encode(value))
    }

    throw new TypeCoercionError(`A composite key of "${this.codec.model}" must be a plain object`, {
      model: this.codec.model,
    })
  }
}
