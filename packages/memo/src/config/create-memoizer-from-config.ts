import {
  type CacheBackend,
  type Clock,
  createRedisStringClient,
  MemoryCacheBackend,
  RedisCacheBackend,
  type RedisClientFactory,
  type RedisStringClient,
  SystemClock,
} from "@memento/cache"
import { createPinoLogger, type Logger } from "@memento/logger"
import { createMemoizer, type Memoizer } from "../core/memoizer"
import type { ContextStore } from "../ports/context-store"
import type { MemoConfig } from "./schema"

export type MemoizerFromConfigDeps = {
  /**
   * Client for the redis backend. When absent and `config.redis` is set, one
   * is created from `config.redis.url`, its errors are logged, and `close()`
   * quits it. Injected clients keep whatever error handling the caller gave them.
   */
  redisClient?: RedisStringClient
  /** @default createRedisStringClient */
  createRedisClient?: RedisClientFactory
  clock?: Clock
  logger?: Logger
  contextStore?: ContextStore
}

export type ConfiguredMemoizer = Memoizer & {
  /**
   * Release what this memoizer opened itself. Injected clients stay open.
   */
  close(): Promise<void>
}

/**
 * Build a memoizer from loaded settings: a redis backend when `config.redis`
 * is set, an in-process memory backend otherwise.
 */
export async function createMemoizerFromConfig(
  config: MemoConfig,
  deps: MemoizerFromConfigDeps = {},
): Promise<ConfiguredMemoizer> {
  const logger =
    deps.logger ??
    createPinoLogger(
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.service.name, env: config.service.env },
    )

  let ownedClient: RedisStringClient | undefined
  let backend: CacheBackend

  if (config.redis) {
    let client: RedisStringClient
    if (deps.redisClient) {
      client = deps.redisClient
    } else {
      client = (deps.createRedisClient ?? createRedisStringClient)(config.redis.url)
      client.on("error", (err) => logger.error("redis client error", { err }))
      ownedClient = client
    }

    if (!client.isOpen) await client.connect()

    backend = new RedisCacheBackend(
      { client },
      { keyPrefix: config.memo.keyPrefix, version: config.memo.version, batchSize: config.redis.batchSize },
    )
  } else {
    backend = new MemoryCacheBackend(
      { clock: deps.clock ?? new SystemClock() },
      {
        keyPrefix: config.memo.keyPrefix,
        version: config.memo.version,
        ...(config.memo.maxEntries !== undefined && { maxEntries: config.memo.maxEntries }),
      },
    )
  }

  logger.debug("memoizer configured", { backend: backend.constructor.name })

  const memoizer = createMemoizer({
    backend,
    ttlSeconds: config.memo.ttlSeconds,
    logger,
    debugModules: config.memo.debugModules,
    ...(deps.contextStore && { contextStore: deps.contextStore }),
  })

  return {
    ...memoizer,
    close: async () => {
      if (ownedClient?.isOpen) await ownedClient.quit()
    },
  }
}
