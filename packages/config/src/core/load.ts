import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigValidationError } from "./errors"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Default: the process environment only. */
  sources?: readonly ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }))

    throw new ConfigValidationError(issues, z.prettifyError(result.error))
  }

  const known = new Set(Object.keys(result.data))
  const kept = Object.fromEntries(
    Object.entries(provenance).filter(([key]) => known.has(key)),
  )

  return new Config<T>(result.data, kept, new Set(Object.keys(merged)))
}
