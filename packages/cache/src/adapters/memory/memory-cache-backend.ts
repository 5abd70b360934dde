import type { Clock } from "../../core/time/clock"
import { VersionedKeyspace } from "../../core/keyspace/versioned-keyspace"
import type { CacheBackend } from "../../ports/cache-backend"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { KeyspaceOptions } from "../../ports/keyspace"
import type { Milliseconds, Seconds } from "../../ports/time"

export type MemoryCacheBackendOptions = KeyspaceOptions & {
  /**
   * Maximum number of entries retained by the backend.
   *
   * When an insert would exceed it, the oldest insertion is evicted first.
   * Leave it out for an unbounded backend.
   */
  maxEntries?: number
}

export type MemoryCacheBackendDeps = {
  clock: Clock
}

type MemoryCacheEntry = {
  value: unknown
  expiresAtMs?: Milliseconds
}

export class MemoryCacheBackend implements CacheBackend {
  private readonly store = new Map<string, MemoryCacheEntry>()
  private readonly keyspace: VersionedKeyspace

  public constructor(
    private readonly deps: MemoryCacheBackendDeps,
    private readonly opts: MemoryCacheBackendOptions,
  ) {
    if (opts.maxEntries !== undefined && (!Number.isInteger(opts.maxEntries) || opts.maxEntries < 1)) {
      throw new RangeError(`maxEntries must be a positive integer, got ${opts.maxEntries}.`)
    }

    this.keyspace = new VersionedKeyspace(opts)
  }

  async get(key: CacheKey): Promise<CacheResult<unknown>> {
    const fullKey = this.keyspace.fullKey(key)
    const entry = this.store.get(fullKey)

    if (entry === undefined) return { kind: "miss" }

    if (this.isExpired(entry)) {
      this.store.delete(fullKey)
      return { kind: "miss" }
    }

    return { kind: "hit", value: entry.value }
  }

  async set(key: CacheKey, value: unknown, opts?: Partial<CacheSetOptions>): Promise<void> {
    const fullKey = this.keyspace.fullKey(key)

    // Re-inserting moves the key to the back of the eviction order.
    this.store.delete(fullKey)
    this.ensureCapacity()

    if (opts?.ttlSeconds) {
      this.store.set(fullKey, { value, expiresAtMs: this.toExpiresAtMs(opts.ttlSeconds) })
    } else {
      this.store.set(fullKey, { value })
    }
  }

  async delete(key: CacheKey): Promise<void> {
    this.store.delete(this.keyspace.fullKey(key))
  }

  async deleteByPrefix(prefix: string): Promise<void> {
    const fullPrefix = this.keyspace.fullKey(prefix)

    for (const fullKey of [...this.store.keys()]) {
      if (fullKey.startsWith(fullPrefix)) this.store.delete(fullKey)
    }
  }

  /**
   * Number of stored entries, expired ones included until they are read.
   */
  size(): number {
    return this.store.size
  }

  private ensureCapacity(): void {
    const { maxEntries } = this.opts
    if (maxEntries === undefined) return

    while (this.store.size >= maxEntries) {
      const oldest = this.store.keys().next()
      if (oldest.done) return

      this.store.delete(oldest.value)
    }
  }

  private toExpiresAtMs(ttlSeconds: Seconds): Milliseconds {
    return this.deps.clock.nowMs() + ttlSeconds * 1000
  }

  private isExpired(entry: MemoryCacheEntry): boolean {
    if (entry.expiresAtMs === undefined) return false

    return entry.expiresAtMs <= this.deps.clock.nowMs()
  }
}
