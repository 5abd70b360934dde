import { createClient } from "redis"

export type RedisSetOptions = { EX: number }

export type RedisScanOptions = { MATCH: string; COUNT: number }

export type RedisScanReply = { cursor: string; keys: string[] }

/**
 * The slice of the node-redis client the redis backend talks to.
 */
export type RedisStringClient = {
  get(key: string): Promise<string | null>
  set(key: string, value: string, opts?: RedisSetOptions): Promise<unknown>
  del(keys: string | readonly string[]): Promise<number>
  unlink(keys: string | readonly string[]): Promise<number>
  scan(cursor: string, opts: RedisScanOptions): Promise<RedisScanReply>

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  isOpen: boolean

  /** node-redis emits socket and reconnect failures here; without a listener they crash the process. */
  on(event: "error", listener: (err: Error) => void): unknown
}

export type RedisClientFactory = (url: string) => RedisStringClient

export function createRedisStringClient(url: string): RedisStringClient {
  return createClient({ url }) as unknown as RedisStringClient
}
