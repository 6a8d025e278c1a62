export { MemoryStore, type MemoryStoreDeps, type MemoryStoreOptions } from "./adapters/memory/memory-store"
export { createRedisStore, createRedisStoreFromConfig } from "./adapters/redis/create"
export {
  createRedisStoreClient,
  type RedisConnectionOptions,
  type RedisConnectionSettings,
  type RedisMode,
  type RedisStoreClient,
  redisConnectionOptions,
} from "./adapters/redis/redis-client"
export {
  defaultRedisConfigSources,
  loadRedisStoreConfig,
  REDIS_ENV_PREFIX,
  type RedisStoreConfig,
  redisConfigOptions,
  redisStoreConfigSchema,
} from "./adapters/redis/redis-config"
export {
  type RedisInstrumentation,
  type RedisOption,
  withRedisClusterMode,
  withRedisInstrumentation,
  withRedisLogger,
  withRedisNamespace,
  withRedisTls,
} from "./adapters/redis/redis-options"
export { RedisStore, type RedisStoreDeps, type RedisStoreOptions } from "./adapters/redis/redis-store"
export {
  type CacheErrorCode,
  GetError,
  InvalidExpiryError,
  isKeyNotFound,
  KeyNotFoundError,
  RedisInstrumentationError,
  SetError,
} from "./core/errors"
export { NAMESPACE_SEPARATOR, namespaceKey } from "./core/namespace"
export { type Clock, SystemClock } from "./core/time/clock"
export type { CacheKey } from "./ports/cache-key"
export type { OperationOptions, Store } from "./ports/store"
export type { Milliseconds } from "./ports/time"
