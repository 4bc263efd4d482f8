import { type ConfigSource, DotenvSource, EnvSource, loadConfig, ObjectSource } from "@keymap/config"
import { type KeymapSettings, type SettingsEnv, settingsEnvSchema } from "./schema"

export const SETTINGS_PREFIX = "KEYMAP_"

export type LoadSettingsOptions = {
  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>

  /** Optional dotenv file, read before the environment. */
  dotenvFile?: string
  cwd?: string

  /** Applied last, without prefix. */
  overrides?: Partial<SettingsEnv>
}

export function mapEnvToSettings(env: SettingsEnv): KeymapSettings {
  return {
    app: {
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

/**
 * @throws ConfigurationError listing every invalid setting.
 */
export async function loadKeymapSettings(options: LoadSettingsOptions = {}): Promise<KeymapSettings> {
  const sources: ConfigSource[] = []

  if (options.dotenvFile) {
    sources.push(
      new DotenvSource({
        file: options.dotenvFile,
        required: false,
        prefix: SETTINGS_PREFIX,
        ...(options.cwd !== undefined && { cwd: options.cwd }),
      }),
    )
  }

  sources.push(new EnvSource({ env: options.env ?? process.env, prefix: SETTINGS_PREFIX }))

  if (options.overrides) {
    sources.push(new ObjectSource(options.overrides))
  }

  const config = await loadConfig({ schema: settingsEnvSchema, sources })

  return mapEnvToSettings(config.value)
}
