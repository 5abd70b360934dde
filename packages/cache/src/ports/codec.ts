/**
 * Codec turns cached values into the string payload a remote backend stores
 * and back.
 *
 * @remarks
 * Plain JSON loses `Date`, `Map`, `Set`, `BigInt` and `undefined`; the default
 * codec is built on superjson so those round-trip.
 */
export interface Codec {
  encode(value: unknown): string
  decode(raw: string): unknown
}
