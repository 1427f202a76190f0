import { utf8Codec } from "@routeplane/kv"
import type { DecodedRouteKey } from "../ports/route-entry"
import { escape, unescape } from "./escape"
import { RouteError } from "./route-errors"

export type KeyCodecOptions = {
  jupyterhubPrefix: string

  /**
   * Joins key segments. Must not contain letters, digits or `_`, so that it
   * can never appear inside an escaped segment.
   *
   * @default "/"
   */
  separator?: string
}

const ESCAPED_ALPHABET = /[A-Za-z0-9_]/

/**
 * Maps routespecs and targets to the flat keys of the route namespace:
 * `<prefix>/routes/<escape(routespec)>` and `<prefix>/targets/<escape(target)>`.
 */
export class KeyCodec {
  readonly jupyterhubPrefix: string
  readonly separator: string

  constructor(opts: KeyCodecOptions) {
    const separator = opts.separator ?? "/"

    if (separator.length === 0 || ESCAPED_ALPHABET.test(separator)) {
      throw new Error(
        `KeyCodec: separator ${JSON.stringify(separator)} must be non-empty and contain no letters, digits or "_"`,
      )
    }

    this.jupyterhubPrefix = opts.jupyterhubPrefix
    this.separator = separator
  }

  join(...segments: string[]): string {
    return segments.join(this.separator)
  }

  routeKey(routespec: string): string {
    return this.join(this.jupyterhubPrefix, "routes", escape(routespec))
  }

  targetKey(target: string): string {
    return this.join(this.jupyterhubPrefix, "targets", escape(target))
  }

  /** Covers every route key; used for range listing. */
  routesPrefix(): string {
    return this.join(this.jupyterhubPrefix, "routes") + this.separator
  }

  decodeRouteKey(rawKey: string): string {
    const prefix = this.routesPrefix()

    if (!rawKey.startsWith(prefix)) {
      throw RouteError.decodeError({ reason: `key is not under ${prefix}`, key: rawKey })
    }

    return unescape(rawKey.slice(prefix.length))
  }

  /**
   * Decodes one entry of a routes range read. The stored value is the
   * target, which also addresses the target's data key.
   */
  decodeRouteEntry(rawKey: string, rawValue: Uint8Array): DecodedRouteKey {
    const routespec = this.decodeRouteKey(rawKey)

    let target: string
    try {
      target = utf8Codec.decode(rawValue)
    } catch (err) {
      throw RouteError.decodeError({ reason: "route value is not UTF-8", key: rawKey, cause: err })
    }

    return { routespec, target, targetKey: this.targetKey(target) }
  }
}
