import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@nscache/config"
import { z } from "zod"
import {
  type RedisOption,
  withRedisClusterMode,
  withRedisNamespace,
  withRedisTls,
} from "./redis-options"

export const REDIS_ENV_PREFIX = "REDIS_"

const flag = z.union([z.boolean(), z.stringbool()]).default(false)

/**
 * Variables are read without the `REDIS_` prefix, so `ADDRESS` is
 * `REDIS_ADDRESS` in the environment.
 */
export const redisStoreConfigSchema = z.object({
  ADDRESS: z.string().min(1),
  PASSWORD: z.string().default(""),
  NAMESPACE: z.string().default(""),
  DISABLE_CLUSTER_MODE: flag,
  DISABLE_TLS: flag,
})

export type RedisStoreConfig = {
  /** `host:port` of the server, or of any node when clustered. */
  address: string
  password: string
  namespace: string
  /**
   * Cluster mode is on unless disabled, so production clients get it by
   * default. Local setups usually run a single node and set this.
   */
  disableClusterMode: boolean
  /**
   * TLS is on unless disabled, and only ever applies in cluster mode.
   */
  disableTls: boolean
}

export function defaultRedisConfigSources(cwd?: string): ConfigSource[] {
  return [
    new DotenvSource({ file: ".env", required: false, prefix: REDIS_ENV_PREFIX, cwd }),
    new EnvSource({ prefix: REDIS_ENV_PREFIX }),
  ]
}

export async function loadRedisStoreConfig(
  sources: readonly ConfigSource[] = defaultRedisConfigSources(),
): Promise<RedisStoreConfig> {
  const { value } = await loadConfig({ schema: redisStoreConfigSchema, sources })

  return {
    address: value.ADDRESS,
    password: value.PASSWORD,
    namespace: value.NAMESPACE,
    disableClusterMode: value.DISABLE_CLUSTER_MODE,
    disableTls: value.DISABLE_TLS,
  }
}

export function redisConfigOptions(config: RedisStoreConfig): RedisOption[] {
  const options: RedisOption[] = []

  if (config.namespace !== "") options.push(withRedisNamespace(config.namespace))
  if (!config.disableClusterMode) options.push(withRedisClusterMode())
  if (!config.disableTls) options.push(withRedisTls())

  return options
}
