import type { DynamicConfig, DynamicConfigValue } from "../ports/dynamic-config"

/**
 * Flattens a nested config into `[key, value]` pairs under `prefix`.
 *
 * @remarks
 * Object keys and array indexes become key segments. Scalars are stringified;
 * `null` and `undefined` leaves are dropped, as are empty objects and arrays.
 *
 * @example
 * ```ts
 * flattenForKv({ http: { middlewares: ["a", "b"] } }, "/traefik")
 * // [["/traefik/http/middlewares/0", "a"], ["/traefik/http/middlewares/1", "b"]]
 * ```
 */
export function flattenForKv(
  config: DynamicConfig,
  prefix: string,
  separator = "/",
): [string, string][] {
  const out: [string, string][] = []

  const visit = (path: string, value: DynamicConfigValue): void => {
    if (value === null || value === undefined) return

    if (Array.isArray(value)) {
      value.forEach((item, index) => visit(`${path}${separator}${index}`, item))
      return
    }

    if (typeof value === "object") {
      for (const [key, child] of Object.entries(value)) {
        visit(`${path}${separator}${key}`, child)
      }
      return
    }

    out.push([path, String(value)])
  }

  for (const [key, value] of Object.entries(config)) {
    visit(`${prefix}${separator}${key}`, value)
  }

  return out
}
