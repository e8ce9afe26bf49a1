/**
 * Converts typed values to the bytes a {@link BytesCache} stores.
 *
 * Adapters treat codec output as opaque and never import codecs themselves.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}
