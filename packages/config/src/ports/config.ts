/**
 * Validated configuration plus a record of where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ ADDRESS: z.string(), NAMESPACE: z.string().default("") }),
 *   sources: [new DotenvSource({ file: ".env", required: false, prefix: "REDIS_" })],
 * })
 *
 * config.get("ADDRESS")       // "127.0.0.1:6379"
 * config.explain("NAMESPACE") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that supplied the final value of `key`, or `default`
   * when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that supplied at least one value. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know. */
  unknownKeys(): string[]
}
