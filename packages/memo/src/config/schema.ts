import { logLevelNames } from "@memento/logger"
import { z } from "zod"

export const memoEnvSchema = z.object({
  SERVICE_NAME: z.string().default("memento"),
  APP_ENV: z.string().default("development"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),

  MEMO_DEFAULT_TTL_SECONDS: z.coerce.number().int().nonnegative().default(900),
  MEMO_KEY_PREFIX: z.string().default(""),
  MEMO_KEY_VERSION: z.coerce.number().int().positive().default(1),
  MEMO_MAX_ENTRIES: z.coerce.number().int().positive().optional(),
  MEMO_DEBUG_MODULES: z.string().default(""),

  REDIS_URL: z.string().optional(),
  REDIS_BATCH_SIZE: z.coerce.number().int().positive().default(500),
})

export type MemoEnvConfig = z.infer<typeof memoEnvSchema>

export type MemoConfig = {
  service: {
    name: string
    env: string
  }

  logging: {
    level: MemoEnvConfig["LOG_LEVEL"]
    prettify: boolean
  }

  memo: {
    ttlSeconds: number
    keyPrefix: string
    version: number
    maxEntries?: number
    debugModules: string[]
  }

  redis?: {
    url: string
    batchSize: number
  }
}

export function mapEnvToMemoConfig(env: MemoEnvConfig): MemoConfig {
  return {
    service: {
      name: env.SERVICE_NAME,
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    memo: {
      ttlSeconds: env.MEMO_DEFAULT_TTL_SECONDS,
      keyPrefix: env.MEMO_KEY_PREFIX,
      version: env.MEMO_KEY_VERSION,
      ...(env.MEMO_MAX_ENTRIES !== undefined && { maxEntries: env.MEMO_MAX_ENTRIES }),
      debugModules: splitList(env.MEMO_DEBUG_MODULES),
    },
    ...(env.REDIS_URL !== undefined &&
      env.REDIS_URL.length > 0 && {
        redis: { url: env.REDIS_URL, batchSize: env.REDIS_BATCH_SIZE },
      }),
  }
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}
