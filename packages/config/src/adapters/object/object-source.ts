import type { ConfigSource } from "../../ports/source"

export class ObjectSource implements ConfigSource {
  readonly name = "object:overrides"

  constructor(private readonly values: Readonly<Record<string, unknown>>) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
