import type { CacheKey } from "../ports/cache-key"

/**
 * Redis has no namespace delimiter of its own; ":" is the de facto one.
 */
export const NAMESPACE_SEPARATOR = ":"

export function namespaceKey(namespace: string, key: CacheKey): string {
  if (namespace === "") return key

  return `${namespace}${NAMESPACE_SEPARATOR}${key}`
}
