/**
 * Bidirectional transform between a typed value and the bytes kept in the store.
 *
 * @remarks
 * Codecs are pure and deterministic. Store adapters treat their output as
 * opaque bytes and never depend on a codec.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
