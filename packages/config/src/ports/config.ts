/**
 * Validated settings plus where each value came from.
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /** Name of the source that supplied `key`, or "default" for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that supplied at least one value, in order. */
  sourcesUsed(): string[]

  /** Keys supplied by a source that the schema does not declare. */
  unknownKeys(): string[]
}
