import type { Uuid } from "@keymap/schema"
import type { CompositeKeyValue, FlatStorageMapping, StoredMapping } from "./mapping"

export type ReferenceVariant = "simple" | "string_coerced" | "composite"

type ReferenceColumnShape<V extends ReferenceVariant, TValid, TDb, TRead> = {
  readonly variant: V
  /** Name of the referenced model. */
  readonly model: string
  /** Whether a secondary index is declared on the column. */
  readonly indexed: boolean

  validate(value: unknown): Promise<TValid>
  toDatabase(value: unknown): Promise<TDb | null>
  fromDatabase(raw: unknown): Promise<TRead>
}

/**
 * Points at an entity whose primary key is a single UUID.
 */
export type SimpleReference = ReferenceColumnShape<"simple", Uuid | null, Uuid, Uuid | null>

/**
 * Same storage as {@link SimpleReference}; reads back a plain string
 * for callers that look the id up somewhere that does not know the brand.
 */
export type StringCoercedReference = ReferenceColumnShape<
  "string_coerced",
  Uuid | null,
  Uuid,
  string | null
>

/**
 * Points at an entity with a multi-field primary key, stored as a map of
 * field id to text.
 */
export type CompositeReference = ReferenceColumnShape<
  "composite",
  FlatStorageMapping,
  StoredMapping,
  CompositeKeyValue
>

export type ReferenceColumn =
  | SimpleReference
  | StringCoercedReference
  | CompositeReference
