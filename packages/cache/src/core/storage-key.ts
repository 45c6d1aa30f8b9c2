import type { CacheKey } from "../ports/cache-key"

/**
 * Flatten a {@link CacheKey} into a map key. JSON encoding keeps it
 * unambiguous whatever characters the table or operation names contain.
 */
export function toStorageKey(key: CacheKey): string {
  return JSON.stringify([key.table, key.operation])
}
