import fs from "node:fs/promises"
import path from "node:path"
import { ConfigurationError } from "@keymap/errors"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /** Absolute, or relative to `cwd`. */
  file: string

  /** When `false`, a missing file loads as empty. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /** Same meaning as for `EnvSource`. */
  prefix?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!isMissingFile(err)) throw err
      if (this.opts.required) {
        throw new ConfigurationError(`Settings file not found: ${filePath}`, { file: filePath }, err)
      }
      return {}
    }

    const prefix = this.opts.prefix ?? ""
    const out: Record<string, string> = {}

    for (const [key, value] of Object.entries(parse(content))) {
      if (key.startsWith(prefix)) out[key.slice(prefix.length)] = value
    }

    return out
  }
}
