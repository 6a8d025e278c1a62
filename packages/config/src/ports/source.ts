/**
 * A source of raw configuration values.
 *
 * Sources only load. Coercion and validation belong to the schema given to
 * `loadConfig`, which applies sources in order so that later sources override
 * earlier ones.
 */
export interface ConfigSource {
  /**
   * Provenance label, e.g. `env`, `dotenv:.env`, `object:overrides`.
   */
  readonly name: string

  /**
   * Returns a fresh object on every call. A key mapped to `undefined` counts as
   * not provided.
   */
  load(): Promise<Record<string, unknown>>
}
