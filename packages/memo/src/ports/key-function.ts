import type { CacheKey } from "@memento/cache"
import type { CallArguments } from "./call-arguments"
import type { DoNotCache, Marker } from "./marker"
import type { Parameter } from "./parameter"

/**
 * What a key function may know about the memoized callable.
 */
export type MemoTarget = Readonly<{
  /** Identity prefix, e.g. `"billing:Invoice.total:"`. */
  identity: string
  parameters: readonly Parameter[]
  /** Position of the context parameter, for context-scoped wrappers. */
  contextIndex?: number
}>

/**
 * Derives the cache key of one call, or returns the wrapper's marker to skip
 * the cache for it.
 *
 * Keys of one callable must start with its identity prefix, or `clear()`
 * will not find them.
 */
export type KeyFunction<M extends Marker = DoNotCache> = (
  target: MemoTarget,
  call: CallArguments,
) => CacheKey | M
