/**
 * CacheKey is a plain string and opaque to stores.
 *
 * @remarks
 * Callers pass keys without the store's namespace; the store prefixes them
 * before they reach the backend. Keep keys stable and versioned so that a
 * change of value shape does not read old entries.
 *
 * @example
 * ```ts
 * const key: CacheKey = "user:v2:123"
 * ```
 */
export type CacheKey = string
