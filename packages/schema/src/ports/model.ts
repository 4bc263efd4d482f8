import type { FieldType } from "./field-type"

export type FieldDefinition<T = unknown> = {
  /** Matches the identifier grammar `[A-Za-z0-9_]+`. */
  readonly id: string
  readonly type: FieldType<T>
  readonly primaryKey: boolean
  readonly partitionKey: boolean
  readonly default?: () => T
}

/**
 * Field layout of one model (table).
 */
export type ModelSchema = {
  readonly name: string
  readonly fields: ReadonlyMap<string, FieldDefinition>

  /** Primary-key fields in declaration order. Never empty. */
  readonly primaryKey: readonly FieldDefinition[]
}
