export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { Config } from "./core/config"
export { type ConfigIssue, ConfigValidationError } from "./core/errors"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
