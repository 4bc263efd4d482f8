import { ConfigurationError, SchemaResolutionError } from "@keymap/errors"
import type { Logger } from "@keymap/logger"
import type { ModelSchema } from "../../ports/model"
import type { ModelRegistry } from "../../ports/model-registry"

export type MemoryModelRegistryDeps = {
  logger: Logger
}

/**
 * Process-local model catalog. Models are registered once, at definition time.
 */
export class MemoryModelRegistry implements ModelRegistry {
  private readonly models = new Map<string, ModelSchema>()
  private readonly logger: Logger

  constructor(deps: MemoryModelRegistryDeps) {
    this.logger = deps.logger.child({ module: "model-registry" })
  }

  register(...schemas: ModelSchema[]): this {
    for (const schema of schemas) {
      if (this.models.has(schema.name)) {
        throw new ConfigurationError(`Model "${schema.name}" is already registered`, {
          model: schema.name,
        })
      }

      this.models.set(schema.name, schema)
      this.logger.debug("model registered", {
        operation: "register",
        model: schema.name,
        primaryKey: schema.primaryKey.map((f) => f.id),
      })
    }

    return this
  }

  has(name: string): boolean {
    return this.models.has(name)
  }

  async resolve(name: string): Promise<ModelSchema> {
    const schema = this.models.get(name)

    if (!schema) {
      const err = new SchemaResolutionError(name)
      this.logger.warn("model not found", { operation: "resolve", model: name, err })
      throw err
    }

    this.logger.debug("model resolved", { operation: "resolve", model: name })
    return schema
  }
}

export function createMemoryModelRegistry(deps: MemoryModelRegistryDeps): MemoryModelRegistry {
  return new MemoryModelRegistry(deps)
}
