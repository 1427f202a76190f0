import type { Codec } from "../../ports/codec"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * Strict UTF-8: decoding throws a `TypeError` on malformed input.
 */
export const utf8Codec: Codec<string> = {
  encode: (value) => encoder.encode(value),
  decode: (bytes) => decoder.decode(bytes),
}
