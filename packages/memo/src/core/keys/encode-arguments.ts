import stringify from "fast-json-stable-stringify"
import superjson from "superjson"
import { KeyEncodingError } from "../errors/key-encoding-error"

const ENCODABLE_CLASSES = [Date, RegExp, URL] as const

/**
 * Deterministic text form of an argument vector.
 *
 * The vector goes through superjson so `undefined`, `Date`, `BigInt`, `Map`,
 * `Set` and `RegExp` stay apart from their JSON look-alikes, then through a
 * stable stringify so object key order does not matter. Type annotations
 * are appended after `#` only when superjson produced any.
 *
 * Functions, symbols, cycles and class instances other than the ones above
 * would collapse into the same text as unrelated values; they raise
 * {@link KeyEncodingError} instead.
 *
 * @example
 * ```ts
 * encodeArguments([1, "eu"]) // '[1,"eu"]'
 * encodeArguments([{ b: 2, a: 1 }]) // '[{"a":1,"b":2}]'
 * ```
 */
export function encodeArguments(values: readonly unknown[]): string {
  assertEncodable(values, "$", new Set())

  const { json, meta } = superjson.serialize(values)
  const body = stringify(json)

  return meta === undefined ? body : `${body}#${stringify(meta)}`
}

function assertEncodable(value: unknown, path: string, ancestors: Set<object>): void {
  if (typeof value === "function" || typeof value === "symbol") {
    throw KeyEncodingError.unencodable(path, typeof value)
  }
  if (typeof value !== "object" || value === null) return
  if (ENCODABLE_CLASSES.some((type) => value instanceof type)) return

  if (ancestors.has(value)) throw KeyEncodingError.unencodable(path, "cycle")
  ancestors.add(value)

  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) assertEncodable(value[i], `${path}[${i}]`, ancestors)
  } else if (value instanceof Map) {
    let i = 0
    for (const [key, item] of value) {
      assertEncodable(key, `${path}.keys[${i}]`, ancestors)
      assertEncodable(item, `${path}.values[${i}]`, ancestors)
      i++
    }
  } else if (value instanceof Set) {
    let i = 0
    for (const item of value) assertEncodable(item, `${path}.items[${i++}]`, ancestors)
  } else if (isPlainObject(value)) {
    if (Object.getOwnPropertySymbols(value).length > 0) throw KeyEncodingError.unencodable(path, "symbol key")
    for (const [key, item] of Object.entries(value)) assertEncodable(item, `${path}.${key}`, ancestors)
  } else {
    throw KeyEncodingError.unencodable(path, value.constructor?.name || "object")
  }

  ancestors.delete(value)
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}
