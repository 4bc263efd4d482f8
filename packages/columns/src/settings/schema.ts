import { type LogLevelName, logLevelNames } from "@keymap/logger"
import { z } from "zod"

/**
 * Settings read from `KEYMAP_`-prefixed environment variables, prefix removed.
 */
export const settingsEnvSchema = z.object({
  APP_ENV: z.string().min(1).default("development"),
  SERVICE_NAME: z.string().min(1).default("keymap"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type SettingsEnv = z.infer<typeof settingsEnvSchema>

export type KeymapSettings = {
  app: {
    env: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}
