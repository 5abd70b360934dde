import superjson from "superjson"
import type { Codec } from "../../ports/codec"

export function createSuperjsonCodec(): Codec {
  return {
    encode: (value) => superjson.stringify(value),
    decode: (raw) => superjson.parse(raw),
  }
}
