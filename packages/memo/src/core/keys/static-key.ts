import type { CacheKey } from "@memento/cache"
import type { CallArguments } from "../../ports/call-arguments"
import type { MemoTarget } from "../../ports/key-function"

/**
 * Key that ignores the arguments: identity prefix plus the bucket named by
 * the `cachekey` keyword argument, empty when absent.
 *
 * The wrapped function receives `cachekey` like any other keyword argument,
 * so it has to declare it.
 */
export function staticKey(target: MemoTarget, call: CallArguments): CacheKey {
  const bucket = call.kwargs?.cachekey

  return target.identity + (bucket === undefined ? "" : String(bucket))
}
