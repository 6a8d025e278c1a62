import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { selectPrefixed } from "../../core/select-prefixed"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /**
   * When `false`, a missing file loads as an empty object.
   */
  required: boolean

  /** Same semantics as `EnvSource`'s prefix. */
  prefix?: string

  /** @default process.cwd() */
  cwd?: string
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
      if (!this.opts.required && isMissingFile(err)) return {}
      throw err
    }

    return selectPrefixed(parse(content), this.opts.prefix)
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
