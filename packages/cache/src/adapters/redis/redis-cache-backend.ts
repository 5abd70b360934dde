import { createSuperjsonCodec } from "../../core/codec/superjson-codec"
import { VersionedKeyspace } from "../../core/keyspace/versioned-keyspace"
import type { RedisStringClient } from "../../core/redis-client"
import type { CacheBackend } from "../../ports/cache-backend"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { Codec } from "../../ports/codec"
import type { KeyspaceOptions } from "../../ports/keyspace"

export type RedisCacheBackendOptions = KeyspaceOptions & {
  /**
   * Number of keys requested per `SCAN` round trip and unlinked per
   * `UNLINK` when deleting by prefix.
   *
   * Typical values are in the range of 100–1000.
   */
  batchSize: number
}

export type RedisCacheBackendDeps = {
  client: RedisStringClient
  codec?: Codec
}

const GLOB_METACHARACTERS = /[*?[\]\\]/g

export class RedisCacheBackend implements CacheBackend {
  private readonly client: RedisStringClient
  private readonly codec: Codec
  private readonly keyspace: VersionedKeyspace

  public constructor(
    deps: RedisCacheBackendDeps,
    private readonly opts: RedisCacheBackendOptions,
  ) {
    if (!Number.isInteger(opts.batchSize) || opts.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${opts.batchSize}.`)
    }

    this.client = deps.client
    this.codec = deps.codec ?? createSuperjsonCodec()
    this.keyspace = new VersionedKeyspace(opts)
  }

  async get(key: CacheKey): Promise<CacheResult<unknown>> {
    const raw = await this.client.get(this.keyspace.fullKey(key))

    if (raw === null) return { kind: "miss" }

    return { kind: "hit", value: this.codec.decode(raw) }
  }

  async set(key: CacheKey, value: unknown, opts?: Partial<CacheSetOptions>): Promise<void> {
    const fullKey = this.keyspace.fullKey(key)
    const raw = this.codec.encode(value)

    if (opts?.ttlSeconds) {
      await this.client.set(fullKey, raw, { EX: Math.max(1, Math.ceil(opts.ttlSeconds)) })
    } else {
      await this.client.set(fullKey, raw)
    }
  }

  async delete(key: CacheKey): Promise<void> {
    await this.client.del(this.keyspace.fullKey(key))
  }

  async deleteByPrefix(prefix: string): Promise<void> {
    const match = `${escapeGlob(this.keyspace.fullKey(prefix))}*`
    let cursor = "0"

    do {
      const reply = await this.client.scan(cursor, { MATCH: match, COUNT: this.opts.batchSize })
      cursor = reply.cursor

      for (const batch of chunks(reply.keys, this.opts.batchSize)) {
        if (batch.length > 0) await this.client.unlink(batch)
      }
    } while (cursor !== "0")
  }
}

export function escapeGlob(value: string): string {
  return value.replace(GLOB_METACHARACTERS, (ch) => `\\${ch}`)
}

function* chunks<T>(items: readonly T[], size: number): Generator<readonly T[]> {
  for (let i = 0; i < items.length; i += size) {
    yield items.slice(i, i + size)
  }
}
