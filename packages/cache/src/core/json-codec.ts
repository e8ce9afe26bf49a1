import superjson from "superjson"
import type { Codec } from "../ports/codec"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * JSON codec that round-trips Dates, Maps, Sets and bigints.
 */
export function createJsonCodec<T>(): Codec<T> {
  return {
    encode: (value: T) => encoder.encode(superjson.stringify(value)),
    decode: (data: Uint8Array) => superjson.parse<T>(decoder.decode(data)),
  }
}
