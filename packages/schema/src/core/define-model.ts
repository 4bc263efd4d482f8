import { ConfigurationError } from "@keymap/errors"
import type { FieldType } from "../ports/field-type"
import type { FieldDefinition, ModelSchema } from "../ports/model"
import { isIdentifier } from "./identifier"

export type FieldOptions<T = unknown> = {
  type: FieldType<T>
  primaryKey?: boolean
  /** Implies `primaryKey`. */
  partitionKey?: boolean
  default?: () => T
}

export type FieldSpec = FieldType<unknown> | FieldOptions

function isFieldOptions(spec: FieldSpec): spec is FieldOptions {
  return "type" in spec
}

function toDefinition(id: string, spec: FieldSpec): FieldDefinition {
  if (!isFieldOptions(spec)) {
    return { id, type: spec, primaryKey: false, partitionKey: false }
  }

  const partitionKey = spec.partitionKey ?? false

  return {
    id,
    type: spec.type,
    primaryKey: partitionKey || (spec.primaryKey ?? false),
    partitionKey,
    ...(spec.default && { default: spec.default }),
  }
}

/**
 * Builds a model schema. Field order is declaration order, and so is the
 * order of the primary key.
 *
 * @example
 * ```ts
 * const Contract = defineModel("Contract", {
 *   organization: { type: fieldTypes.text, partitionKey: true },
 *   start_date: { type: fieldTypes.timestamp, primaryKey: true },
 *   key: { type: fieldTypes.text, primaryKey: true },
 *   amount: fieldTypes.int,
 * })
 * ```
 */
export function defineModel(name: string, fields: Readonly<Record<string, FieldSpec>>): ModelSchema {
  if (!isIdentifier(name)) {
    throw new ConfigurationError(`Model name "${name}" is not a valid identifier`, { model: name })
  }

  const definitions = new Map<string, FieldDefinition>()

  for (const [id, spec] of Object.entries(fields)) {
    if (!isIdentifier(id)) {
      throw new ConfigurationError(`Field id "${id}" of model "${name}" is not a valid identifier`, {
        model: name,
        field: id,
      })
    }
    definitions.set(id, toDefinition(id, spec))
  }

  const primaryKey = [...definitions.values()].filter((f) => f.primaryKey)

  if (primaryKey.length === 0) {
    throw new ConfigurationError(`Model "${name}" declares no primary key`, { model: name })
  }

  return Object.freeze({ name, fields: definitions, primaryKey: Object.freeze(primaryKey) })
}
