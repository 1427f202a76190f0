/**
 * Validated, frozen configuration.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ KV_URL: z.string().default("http://127.0.0.1:2379") }),
 *   sources: [new EnvSource({ prefix: "ROUTEPLANE_" })],
 * })
 *
 * config.get("KV_URL") // "http://etcd:2379"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]
}
