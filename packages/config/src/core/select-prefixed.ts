/**
 * Keep the entries whose key starts with `prefix`, with the prefix removed.
 * Without a prefix every entry is kept.
 */
export function selectPrefixed(
  values: Readonly<Record<string, string | undefined>>,
  prefix?: string,
): Record<string, string | undefined> {
  if (!prefix) return { ...values }

  const out: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) out[key.slice(prefix.length)] = value
  }

  return out
}
