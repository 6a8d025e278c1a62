import { RedisInstrumentationError } from "../../core/errors"
import {
  createRedisStoreClient,
  type RedisMode,
  type RedisStoreClient,
  redisConnectionOptions,
} from "./redis-client"
import { type RedisStoreConfig, redisConfigOptions } from "./redis-config"
import { type RedisInstrumentation, type RedisOption, resolveRedisOptions } from "./redis-options"
import { RedisStore } from "./redis-store"

/**
 * Creates a store over a new node-redis client. Without options the client is
 * single-node, unnamespaced and plain TCP.
 *
 * @remarks
 * - Nothing connects until `store.connect()`; the caller owns `connect()` and
 *   `close()`.
 * - Driver `error` events are logged through the `withRedisLogger` logger.
 *
 * @example
 * ```ts
 * const store = createRedisStore("cache.internal:6379", "test-secret",
 *   withRedisClusterMode(),
 *   withRedisTls(),
 *   withRedisNamespace("sessions"),
 * )
 * await store.connect()
 * ```
 */
export function createRedisStore(
  address: string,
  password: string,
  ...options: RedisOption[]
): RedisStore {
  const opts = resolveRedisOptions(options)
  const connection = redisConnectionOptions({
    address,
    password,
    clusterMode: opts.clusterMode,
    tls: opts.tls,
  })

  const logger = opts.logger.child({
    module: "cache",
    mode: connection.mode,
    address,
    namespace: opts.namespace,
  })

  if (opts.tls && !opts.clusterMode) {
    logger.debug("tls requested without cluster mode; connecting without tls")
  }

  const client = createRedisStoreClient(connection)

  client.on("error", (err) => logger.error("redis client error", { err }))

  instrument(client, connection.mode, opts.instrumentations)

  return new RedisStore({ client }, { namespace: opts.namespace, mode: connection.mode })
}

/**
 * Like {@link createRedisStore}, with cluster mode and TLS on unless the config
 * disables them. `extra` options apply after the config's.
 */
export function createRedisStoreFromConfig(
  config: RedisStoreConfig,
  ...extra: RedisOption[]
): RedisStore {
  return createRedisStore(config.address, config.password, ...redisConfigOptions(config), ...extra)
}

function instrument(
  client: RedisStoreClient,
  mode: RedisMode,
  instrumentations: readonly RedisInstrumentation[],
): void {
  for (const attach of instrumentations) {
    try {
      attach(client, mode)
    } catch (err) {
      // Hooks only reject client types they do not know, which the factory
      // above never builds.
      throw new RedisInstrumentationError(mode, err)
    }
  }
}
