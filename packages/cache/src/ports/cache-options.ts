import type { Seconds } from "./time"

export type CacheSetOptions = {
  /**
   * Lifetime of the entry. Absent or `0` stores the entry without expiry.
   */
  ttlSeconds: Seconds
}
