/**
 * Value a key function or a computation returns to say "do not cache this
 * call". Compared by identity, so it has to be a symbol or an object.
 */
export type Marker = symbol | object

/**
 * Default do-not-cache marker.
 *
 * @example
 * ```ts
 * const findUser = memoize({ module: "users", name: "findUser", backend }, async (id: number) => {
 *   const user = await db.find(id)
 *   return user ?? DO_NOT_CACHE
 * })
 * ```
 */
export const DO_NOT_CACHE: unique symbol = Symbol("memento.do_not_cache")

export type DoNotCache = typeof DO_NOT_CACHE

export function isMarker(value: unknown, marker: Marker): boolean {
  return value === marker
}
