import type { ConfigSource } from "../../ports/source"

/**
 * Programmatic values, typically placed last to override everything else.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Readonly<Record<string, unknown>>,
    label = "overrides",
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
