/**
 * CacheKey is a plain string. Keys written by memoized callables start with
 * the callable's identity prefix, which is what prefix invalidation relies on.
 *
 * @example
 * ```ts
 * const key: CacheKey = "reports:total:[2024,\"eu\"]"
 * ```
 */
export type CacheKey = string
