import type { CacheKey } from "./cache-key"
import type { Milliseconds } from "./time"

export type OperationOptions = {
  /**
   * Cancels the operation from the caller's side. Stores impose no timeout of
   * their own.
   */
  signal?: AbortSignal
}

/**
 * Store is a string cache where every entry has a bounded lifetime.
 *
 * @remarks
 * Expiry and eviction are enforced by the backend. Errors are thrown to the
 * caller as is; stores neither log nor retry.
 */
export interface Store {
  /**
   * Store `value` under `key` for `expiry` milliseconds, overwriting any
   * existing entry.
   *
   * @throws InvalidExpiryError when `expiry` is not a positive, finite number.
   * No backend call is made in that case.
   * @throws SetError when the backend write fails or is cancelled.
   */
  set(
    key: CacheKey,
    value: string,
    expiry: Milliseconds,
    opts?: OperationOptions,
  ): Promise<void>

  /**
   * Read the value stored under `key`.
   *
   * @throws KeyNotFoundError when the key was never set or has expired.
   * @throws GetError when the backend read fails or is cancelled.
   */
  get(key: CacheKey, opts?: OperationOptions): Promise<string>
}
