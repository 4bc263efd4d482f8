import { ValidationError } from "@keymap/errors"
import type { FieldType } from "@keymap/schema"
import { z } from "zod"
import type { FlatStorageMapping, StoredMapping } from "../../ports/mapping"

export type MapColumnOptions = {
  keyType: FieldType<string>
  valueType: FieldType<string>
}

function accepts(type: FieldType<string>, value: string): boolean {
  try {
    type.decodeNative(value)
    return true
  } catch {
    return false
  }
}

/**
 * A map column with primitive keys and values.
 *
 * @remarks
 * Values are text or `null`. A `null` value is kept through `validate` and
 * dropped by `toDatabase`, which is what the store does with it anyway.
 */
export class MapColumn {
  readonly keyType: FieldType<string>
  readonly valueType: FieldType<string>
  private readonly shape: z.ZodType<Record<string, string | null>>

  constructor(options: MapColumnOptions) {
    this.keyType = options.keyType
    this.valueType = options.valueType

    this.shape = z.record(z.string(), z.string().nullable()).superRefine((mapping, ctx) => {
      for (const [key, value] of Object.entries(mapping)) {
        if (!accepts(this.keyType, key)) {
          ctx.addIssue({ code: "custom", path: [key], message: `Invalid key "${key}"` })
        }
        if (value === "") {
          ctx.addIssue({ code: "custom", path: [key], message: `Empty value for key "${key}"` })
        } else if (value !== null && !accepts(this.valueType, value)) {
          ctx.addIssue({ code: "custom", path: [key], message: `Invalid value for key "${key}"` })
        }
      }
    })
  }

  /**
   * @throws ValidationError naming the offending key in `context.issues`.
   */
  validate(value: unknown): FlatStorageMapping {
    const result = this.shape.safeParse(value)

    if (!result.success) {
      throw ValidationError.fromIssues(result.error.issues)
    }

    return result.data
  }

  toDatabase(mapping: unknown): StoredMapping | null {
    const out: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.validate(mapping))) {
      if (value !== null) out[key] = value
    }

    return Object.keys(out).length > 0 ? out : null
  }

  fromDatabase(raw: unknown): FlatStorageMapping {
    if (raw === null || raw === undefined) return {}

    return { ...this.validate(raw) }
  }
}
