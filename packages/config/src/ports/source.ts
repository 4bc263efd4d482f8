/**
 * Somewhere raw settings come from (process env, a .env file, an object of
 * overrides).
 *
 * @remarks
 * A source only loads. Coercion, defaults and validation happen once, over the
 * merged result, in `loadConfig`. Later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env", "dotenv:.env", "object:overrides". */
  readonly name: string

  /** Keys mapped to `undefined` count as "not provided". */
  load(): Promise<Record<string, unknown>>
}
