import { abortable } from "../../core/abortable"
import { GetError, KeyNotFoundError, SetError } from "../../core/errors"
import { expiryToPx } from "../../core/expiry"
import { namespaceKey } from "../../core/namespace"
import { type Clock, SystemClock } from "../../core/time/clock"
import type { CacheKey } from "../../ports/cache-key"
import type { OperationOptions, Store } from "../../ports/store"
import type { Milliseconds } from "../../ports/time"

export type MemoryStoreDeps = {
  clock: Clock
}

export type MemoryStoreOptions = {
  namespace: string
}

type MemoryStoreEntry = {
  value: string
  expiresAtMs: Milliseconds
}

/**
 * In-process {@link Store} for local development and tests. Expired entries
 * are dropped when read; nothing sweeps them in the background.
 */
export class MemoryStore implements Store {
  private readonly entries = new Map<string, MemoryStoreEntry>()

  public constructor(
    private readonly deps: MemoryStoreDeps = { clock: new SystemClock() },
    private readonly opts: MemoryStoreOptions = { namespace: "" },
  ) {}

  get namespace(): string {
    return this.opts.namespace
  }

  async set(
    key: CacheKey,
    value: string,
    expiry: Milliseconds,
    opts?: OperationOptions,
  ): Promise<void> {
    const px = expiryToPx(expiry)
    const fullKey = namespaceKey(this.opts.namespace, key)
    const expiresAtMs = this.deps.clock.nowMs() + px

    try {
      await abortable(async () => {
        this.entries.set(fullKey, { value, expiresAtMs })
      }, opts?.signal)
    } catch (err) {
      throw new SetError(fullKey, err)
    }
  }

  async get(key: CacheKey, opts?: OperationOptions): Promise<string> {
    const fullKey = namespaceKey(this.opts.namespace, key)

    let entry: MemoryStoreEntry | undefined

    try {
      entry = await abortable(async () => this.read(fullKey), opts?.signal)
    } catch (err) {
      throw new GetError(fullKey, err)
    }

    if (!entry) throw new KeyNotFoundError(fullKey)

    return entry.value
  }

  private read(fullKey: string): MemoryStoreEntry | undefined {
    const entry = this.entries.get(fullKey)
    if (!entry) return undefined

    if (entry.expiresAtMs <= this.deps.clock.nowMs()) {
      this.entries.delete(fullKey)
      return undefined
    }

    return entry
  }
}
