import type { ModelRegistry, Uuid } from "@keymap/schema"
import type {
  CompositeReference,
  SimpleReference,
  StringCoercedReference,
} from "../../ports/reference-column"
import type { ReferenceOptions } from "../../ports/reference-options"
import { CompositeReferenceColumn } from "./composite-reference-column"
import { UuidReferenceColumn } from "./uuid-reference-column"

export type RelationColumnsDeps = {
  registry: ModelRegistry
}

/**
 * Column factories bound to one model registry.
 */
export type RelationColumns = {
  /** Reference to an entity keyed by a single UUID. */
  relation(options: ReferenceOptions): SimpleReference
  /** Like `relation`, read back as a plain string. */
  sqlRelation(options: ReferenceOptions): StringCoercedReference
  /** Reference to an entity with a composite primary key. */
  compositeRelation(options: ReferenceOptions): CompositeReference
}

export function createRelationColumns(deps: RelationColumnsDeps): RelationColumns {
  return {
    relation: (options) => new UuidReferenceColumn(deps, "simple", options, (id: Uuid) => id),
    sqlRelation: (options) =>
      new UuidReferenceColumn(deps, "string_coerced", options, (id: Uuid): string => id),
    compositeRelation: (options) => new CompositeReferenceColumn(deps, options),
  }
}
