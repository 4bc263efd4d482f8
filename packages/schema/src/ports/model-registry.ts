import type { ModelSchema } from "./model"

/**
 * Resolves a model name to its schema.
 *
 * @remarks
 * Implementations may hit a catalog, so resolution is asynchronous. Callers
 * are expected to cache the result; it does not change for a given name.
 */
export interface ModelRegistry {
  /**
   * @throws SchemaResolutionError when no model has this name.
   */
  resolve(name: string): Promise<ModelSchema>
}
