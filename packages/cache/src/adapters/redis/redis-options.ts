import { createNullLogger, type Logger } from "@nscache/logger"
import type { RedisMode, RedisStoreClient } from "./redis-client"

/**
 * Attaches tracing or metrics to a freshly built driver client. Throwing
 * aborts construction with a `RedisInstrumentationError`.
 */
export type RedisInstrumentation = (client: RedisStoreClient, mode: RedisMode) => void

export type ResolvedRedisOptions = {
  namespace: string
  clusterMode: boolean
  tls: boolean
  logger: Logger
  instrumentations: RedisInstrumentation[]
}

export type RedisOption = (options: ResolvedRedisOptions) => void

export function resolveRedisOptions(options: readonly RedisOption[]): ResolvedRedisOptions {
  const resolved: ResolvedRedisOptions = {
    namespace: "",
    clusterMode: false,
    tls: false,
    logger: createNullLogger(),
    instrumentations: [],
  }

  for (const apply of options) apply(resolved)

  return resolved
}

/**
 * Prefix every key passed to `get` and `set` with `namespace` and ":".
 */
export function withRedisNamespace(namespace: string): RedisOption {
  return (options) => {
    options.namespace = namespace
  }
}

export function withRedisClusterMode(): RedisOption {
  return (options) => {
    options.clusterMode = true
  }
}

/**
 * Connect over TLS 1.2 or later. Has no effect unless cluster mode is on too.
 */
export function withRedisTls(): RedisOption {
  return (options) => {
    options.tls = true
  }
}

export function withRedisLogger(logger: Logger): RedisOption {
  return (options) => {
    options.logger = logger
  }
}

export function withRedisInstrumentation(instrumentation: RedisInstrumentation): RedisOption {
  return (options) => {
    options.instrumentations.push(instrumentation)
  }
}
