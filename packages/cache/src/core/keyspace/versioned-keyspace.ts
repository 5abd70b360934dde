import type { CacheKey } from "../../ports/cache-key"
import type { KeyspaceOptions } from "../../ports/keyspace"

export class VersionedKeyspace {
  private readonly namespace: string

  constructor(opts: KeyspaceOptions) {
    if (!Number.isInteger(opts.version) || opts.version < 1) {
      throw new RangeError(`Keyspace version must be a positive integer, got ${opts.version}.`)
    }

    this.namespace = `${opts.keyPrefix}:${opts.version}:`
  }

  fullKey(key: CacheKey): string {
    return `${this.namespace}${key}`
  }
}
