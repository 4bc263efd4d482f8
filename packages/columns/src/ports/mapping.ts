import type { Entity } from "@keymap/schema"

/**
 * Field id to canonical text, as held in the map column. A `null` value marks
 * a component the store will drop on write.
 */
export type FlatStorageMapping = Readonly<Record<string, string | null>>

/**
 * The map column as the driver writes it: nulls dropped.
 */
export type StoredMapping = Readonly<Record<string, string>>

/**
 * Field id to typed value, one entry per primary-key field.
 */
export type CompositeKeyValue = Readonly<Record<string, unknown>>

/**
 * Anything a composite reference accepts on write. A flat mapping is a
 * composite key value whose components happen to be text.
 */
export type KeyInput = Entity | CompositeKeyValue | null | undefined
