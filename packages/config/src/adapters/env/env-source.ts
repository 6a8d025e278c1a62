import { selectPrefixed } from "../../core/select-prefixed"
import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Only variables starting with this prefix are loaded, with the prefix
   * stripped (`REDIS_ADDRESS` becomes `ADDRESS` under `REDIS_`).
   */
  prefix?: string
  /** Default: `process.env` */
  env?: Readonly<Record<string, string | undefined>>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string | undefined
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    return selectPrefixed(this.env, this.prefix)
  }
}
