import { abortable } from "../../core/abortable"
import { GetError, KeyNotFoundError, SetError } from "../../core/errors"
import { expiryToPx } from "../../core/expiry"
import { namespaceKey } from "../../core/namespace"
import type { CacheKey } from "../../ports/cache-key"
import type { OperationOptions, Store } from "../../ports/store"
import type { Milliseconds } from "../../ports/time"
import type { RedisMode, RedisStoreClient } from "./redis-client"

export type RedisStoreDeps = {
  client: RedisStoreClient
}

export type RedisStoreOptions = {
  /** Empty for no namespace. */
  namespace: string
  mode: RedisMode
}

export class RedisStore implements Store {
  public constructor(
    private readonly deps: RedisStoreDeps,
    private readonly opts: RedisStoreOptions,
  ) {}

  get client(): RedisStoreClient {
    return this.deps.client
  }

  get namespace(): string {
    return this.opts.namespace
  }

  get mode(): RedisMode {
    return this.opts.mode
  }

  /**
   * Opens the driver connection. node-redis does not connect lazily, so this
   * must complete before the first `get` or `set`.
   */
  async connect(): Promise<void> {
    if (this.deps.client.isOpen) return

    await this.deps.client.connect()
  }

  async close(): Promise<void> {
    if (!this.deps.client.isOpen) return

    await this.deps.client.close()
  }

  async set(
    key: CacheKey,
    value: string,
    expiry: Milliseconds,
    opts?: OperationOptions,
  ): Promise<void> {
    const px = expiryToPx(expiry)
    const fullKey = namespaceKey(this.opts.namespace, key)

    try {
      await abortable(() => this.deps.client.set(fullKey, value, { PX: px }), opts?.signal)
    } catch (err) {
      throw new SetError(fullKey, err)
    }
  }

  async get(key: CacheKey, opts?: OperationOptions): Promise<string> {
    const fullKey = namespaceKey(this.opts.namespace, key)

    let value: string | null

    try {
      value = await abortable(() => this.deps.client.get(fullKey), opts?.signal)
    } catch (err) {
      throw new GetError(fullKey, err)
    }

    if (value === null) throw new KeyNotFoundError(fullKey)

    return value
  }
}
