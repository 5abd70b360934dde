import type { ContextStore } from "../../ports/context-store"
import { defaultContextStore } from "./weak-context-store"

export const REQUEST_CACHE_NAMESPACE = "memento.cache:request_cache:"

/**
 * Ad-hoc values kept for the lifetime of a request, in the same per-context
 * mapping request-scoped memoized functions use.
 */
export class RequestCache {
  constructor(private readonly store: ContextStore = defaultContextStore) {}

  get(request: object, key: string): unknown {
    return this.store.peek(request)?.get(REQUEST_CACHE_NAMESPACE + key)
  }

  set<T>(request: object, key: string, value: T): T {
    this.store.entriesFor(request).set(REQUEST_CACHE_NAMESPACE + key, value)

    return value
  }

  delete(request: object, key: string): void {
    this.store.peek(request)?.delete(REQUEST_CACHE_NAMESPACE + key)
  }
}

const defaultRequestCache = new RequestCache()

/**
 * Set `key` when `value` is given, read it otherwise. `null` reads like an
 * absent value; use {@link RequestCache.set} to store it.
 *
 * @example
 * ```ts
 * requestCache(req, "flags", await loadFlags(req))
 * requestCache(req, "flags") // the flags loaded above
 * ```
 */
export function requestCache(request: object, key: string, value?: unknown): unknown {
  if (value !== undefined && value !== null) return defaultRequestCache.set(request, key, value)

  return defaultRequestCache.get(request, key)
}
