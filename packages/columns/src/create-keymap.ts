import { createPinoLogger, type Logger } from "@keymap/logger"
import { MemoryModelRegistry, type ModelRegistry, type ModelSchema } from "@keymap/schema"
import { createRelationColumns, type RelationColumns } from "./core/reference/create-relation-columns"
import { type LoadSettingsOptions, loadKeymapSettings } from "./settings/load-settings"
import type { KeymapSettings } from "./settings/schema"

type RegistryOptions =
  | {
      /** A registry backed by an existing catalog. */
      registry: ModelRegistry
      models?: never
    }
  | {
      registry?: never
      /** Registered in a fresh in-memory registry. */
      models?: readonly ModelSchema[]
    }

export type CreateKeymapOptions = LoadSettingsOptions &
  RegistryOptions & {
    /** Replaces the pino logger built from settings. */
    logger?: Logger
  }

export type Keymap = {
  settings: KeymapSettings
  logger: Logger
  registry: ModelRegistry
  columns: RelationColumns
}

export async function createKeymap(options: CreateKeymapOptions = {}): Promise<Keymap> {
  const settings = await loadKeymapSettings(options)

  const logger =
    options.logger ??
    createPinoLogger(
      {},
      { level: settings.logging.level, prettify: settings.logging.prettify },
      { service: settings.logging.serviceName, env: settings.app.env },
    )

  const registry =
    options.registry ?? new MemoryModelRegistry({ logger }).register(...(options.models ?? []))

  logger.info("keymap ready", {
    operation: "settings",
    models: options.models?.map((m) => m.name) ?? [],
  })

  return {
    settings,
    logger,
    registry,
    columns: createRelationColumns({ registry }),
  }
}
