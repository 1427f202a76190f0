import type { Codec } from "../../ports/codec"
import { utf8Codec } from "./utf8-codec"

/**
 * JSON over UTF-8.
 *
 * @remarks
 * `decode` trusts the stored shape; validate at the call site when the
 * writer is not this process.
 */
export function jsonCodec<T>(): Codec<T> {
  return {
    encode: (value) => utf8Codec.encode(JSON.stringify(value)),
    decode: (bytes): T => JSON.parse(utf8Codec.decode(bytes)),
  }
}
