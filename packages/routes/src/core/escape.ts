import { utf8Codec } from "@routeplane/kv"
import { RouteError } from "./route-errors"

const SAFE_CHAR = /^[A-Za-z0-9]$/
const LONE_SURROGATE = /\p{Cs}/u
const ESCAPED_SEGMENT = /^(?:[A-Za-z0-9]|_[0-9A-F]{2})*$/
const ESCAPED_TOKEN = /[A-Za-z0-9]|_([0-9A-F]{2})/g

export const ESCAPE_CHAR = "_"

/**
 * Encodes any string into a key segment made of `[A-Za-z0-9_]`.
 *
 * @remarks
 * Every other character is written as its UTF-8 bytes, each as `_` plus two
 * uppercase hex digits: `/` becomes `_2F`, `_` becomes `_5F`. Other readers
 * of the same store decode keys with this exact scheme, so changing it is a
 * breaking change to the stored data.
 *
 * Strings holding a lone UTF-16 surrogate have no UTF-8 form and are rejected
 * with `invalid_input`.
 *
 * @example
 * ```ts
 * escape("/user/alice/") // "_2Fuser_2Falice_2F"
 * ```
 */
export function escape(value: string): string {
  if (LONE_SURROGATE.test(value)) {
    throw RouteError.invalidInput({ reason: "lone UTF-16 surrogate", value })
  }

  let out = ""

  for (const char of value) {
    if (SAFE_CHAR.test(char)) {
      out += char
      continue
    }

    for (const byte of utf8Codec.encode(char)) {
      out += `${ESCAPE_CHAR}${byte.toString(16).toUpperCase().padStart(2, "0")}`
    }
  }

  return out
}

/**
 * Inverse of {@link escape}. Accepts only segments that `escape` could have
 * produced; anything else is a `decode_error`.
 */
export function unescape(segment: string): string {
  if (!ESCAPED_SEGMENT.test(segment)) {
    throw RouteError.decodeError({ reason: "not a validly escaped segment", segment })
  }

  const bytes: number[] = []

  for (const match of segment.matchAll(ESCAPED_TOKEN)) {
    const hex = match[1]
    bytes.push(hex === undefined ? match[0].charCodeAt(0) : Number.parseInt(hex, 16))
  }

  let value: string
  try {
    value = utf8Codec.decode(Uint8Array.from(bytes))
  } catch (err) {
    throw RouteError.decodeError({ reason: "escaped bytes are not UTF-8", segment, cause: err })
  }

  if (escape(value) !== segment) {
    throw RouteError.decodeError({ reason: "non-canonical escape sequence", segment })
  }

  return value
}
