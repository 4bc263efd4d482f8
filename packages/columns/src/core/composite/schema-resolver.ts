import { SchemaResolutionError } from "@keymap/errors"
import type { ModelRegistry, ModelSchema } from "@keymap/schema"

export type SchemaResolverDeps = {
  registry: ModelRegistry
}

/**
 * Resolves one model name at most once.
 *
 * Concurrent first callers share the same lookup. A failed lookup is not
 * kept, so the next call asks the registry again.
 */
export class SchemaResolver {
  private resolved: ModelSchema | undefined
  private inflight: Promise<ModelSchema> | undefined
  private readonly registry: ModelRegistry

  constructor(
    deps: SchemaResolverDeps,
    readonly model: string,
  ) {
    this.registry = deps.registry
  }

  resolve(): Promise<ModelSchema> {
    if (this.resolved) return Promise.resolve(this.resolved)
    if (this.inflight) return this.inflight

    const flight = this.registry
      .resolve(this.model)
      .then((schema) => {
        this.resolved = schema
        return schema
      })
      .catch((err: unknown) => {
        throw err instanceof SchemaResolutionError ? err : new SchemaResolutionError(this.model, err)
      })
      .finally(() => {
        this.inflight = undefined
      })

    this.inflight = flight
    return flight
  }
}
