import {
  createClient,
  createCluster,
  type RedisClientOptions,
  type RedisClusterOptions,
} from "redis"

export type RedisMode = "cluster" | "standalone"

/**
 * The slice of a node-redis client or cluster that `RedisStore` relies on.
 */
export type RedisStoreClient = {
  readonly isOpen: boolean

  get(key: string): Promise<string | null>
  set(key: string, value: string, opts: { PX: number }): Promise<unknown>

  connect(): Promise<unknown>
  close(): Promise<unknown>

  on(event: "error", listener: (err: unknown) => void): unknown
}

export type RedisConnectionSettings = {
  /** `host:port` */
  address: string
  /** Empty for no authentication. */
  password: string
  clusterMode: boolean
  /** Only honoured in cluster mode. */
  tls: boolean
}

export type RedisConnectionOptions =
  | { mode: "cluster"; options: RedisClusterOptions }
  | { mode: "standalone"; options: RedisClientOptions }

const TLS_SOCKET = { tls: true, minVersion: "TLSv1.2" } as const

export function redisUrl(address: string): string {
  return `redis://${address}`
}

/**
 * Translate connection settings into node-redis options. A cluster uses the
 * address as its only root node and discovers the rest; a single node always
 * talks plain TCP to database 0.
 */
export function redisConnectionOptions(settings: RedisConnectionSettings): RedisConnectionOptions {
  const url = redisUrl(settings.address)
  const password = settings.password || undefined

  if (!settings.clusterMode) {
    return {
      mode: "standalone",
      options: { url, database: 0, ...(password && { password }) },
    }
  }

  return {
    mode: "cluster",
    options: {
      rootNodes: [{ url }],
      defaults: {
        ...(password && { password }),
        ...(settings.tls && { socket: TLS_SOCKET }),
      },
    },
  }
}

export function createRedisStoreClient(connection: RedisConnectionOptions): RedisStoreClient {
  if (connection.mode === "cluster") {
    return createCluster(connection.options) as unknown as RedisStoreClient
  }

  return createClient(connection.options) as unknown as RedisStoreClient
}
