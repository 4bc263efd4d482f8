import { MissingFieldError, UnexpectedFieldError } from "@keymap/errors"
import type { ModelSchema } from "../ports/model"

/**
 * A live instance of a model: the schema plus one value per field.
 */
export class Entity {
  private readonly values: ReadonlyMap<string, unknown>

  constructor(
    readonly schema: ModelSchema,
    values: ReadonlyMap<string, unknown>,
  ) {
    this.values = values
  }

  get model(): string {
    return this.schema.name
  }

  get(fieldId: string): unknown {
    return this.values.get(fieldId)
  }

  /**
   * Primary-key values keyed by field id, in key order.
   *
   * @throws MissingFieldError when a key component is unset.
   */
  primaryKey(): Record<string, unknown> {
    const out: Record<string, unknown> = {}

    for (const field of this.schema.primaryKey) {
      const value = this.values.get(field.id)
      if (value === undefined || value === null) {
        throw new MissingFieldError(this.schema.name, field.id)
      }
      out[field.id] = value
    }

    return out
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.values)
  }
}

export function isEntity(value: unknown): value is Entity {
  return value instanceof Entity
}

/**
 * Instantiates a model. Missing fields take their default, if any.
 *
 * @throws UnexpectedFieldError for keys the model does not declare.
 */
export function createEntity(schema: ModelSchema, values: Readonly<Record<string, unknown>>): Entity {
  const extra = Object.keys(values).filter((k) => !schema.fields.has(k))
  if (extra.length > 0) {
    throw new UnexpectedFieldError(schema.name, extra)
  }

  const out = new Map<string, unknown>()

  for (const field of schema.fields.values()) {
    const value = values[field.id] ?? field.default?.()
    if (value !== undefined) out.set(field.id, value)
  }

  return new Entity(schema, out)
}
