export type { CacheBackend } from "./ports/cache-backend"
export { supportsPrefixDeletion } from "./ports/cache-backend"
export type { CacheKey } from "./ports/cache-key"
export type { CacheSetOptions } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { Codec } from "./ports/codec"
export type { KeyspaceOptions } from "./ports/keyspace"
export type { Milliseconds, Seconds } from "./ports/time"

export { createSuperjsonCodec } from "./core/codec/superjson-codec"
export { VersionedKeyspace } from "./core/keyspace/versioned-keyspace"
export type { RedisClientFactory, RedisStringClient } from "./core/redis-client"
export { createRedisStringClient } from "./core/redis-client"
export type { Clock } from "./core/time/clock"
export { SystemClock } from "./core/time/clock"

export type { MemoryCacheBackendDeps, MemoryCacheBackendOptions } from "./adapters/memory/memory-cache-backend"
export { MemoryCacheBackend } from "./adapters/memory/memory-cache-backend"
export type { RedisCacheBackendDeps, RedisCacheBackendOptions } from "./adapters/redis/redis-cache-backend"
export { escapeGlob, RedisCacheBackend } from "./adapters/redis/redis-cache-backend"
