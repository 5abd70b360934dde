import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * Global TTL backend consumed by memoized callables.
 *
 * @remarks
 * - Entries may expire or be evicted at any time; a miss never means the
 *   computation has never run.
 * - The backend provides whatever atomicity its storage has and nothing more.
 *   Two callers missing on the same key both compute and the last write wins.
 * - Errors are thrown to the caller; the memoizing layer does not catch them.
 */
export interface CacheBackend {
  /**
   * Look up a key. Expired entries are misses.
   */
  get(key: CacheKey): Promise<CacheResult<unknown>>

  /**
   * Store a value, overwriting any previous entry for the key.
   */
  set(key: CacheKey, value: unknown, opts?: Partial<CacheSetOptions>): Promise<void>

  /**
   * Remove a key. Removing an absent key is a no-op.
   */
  delete(key: CacheKey): Promise<void>

  /**
   * Remove every key that starts with `prefix`.
   *
   * Optional: backends that cannot enumerate their keys leave it out, and
   * clearing a memoized callable becomes a no-op.
   */
  deleteByPrefix?(prefix: string): Promise<void>
}

/**
 * Narrow a backend to one that supports prefix deletion.
 */
export function supportsPrefixDeletion(
  backend: CacheBackend,
): backend is CacheBackend & Required<Pick<CacheBackend, "deleteByPrefix">> {
  return typeof backend.deleteByPrefix === "function"
}
