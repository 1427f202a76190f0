export type ProviderConfig = {
  endpoints: string[]
  rootKey: string
  username?: string
  password?: string
}

export type ProviderStaticConfig = {
  providers: Partial<Record<"etcd" | "redis", ProviderConfig>>
}

export type ProviderStaticConfigInput = {
  backend: "etcd" | "redis"

  /** One URL or several, comma separated. */
  url: string
  traefikPrefix: string
  username?: string
  password?: string
}

/**
 * The proxy's static provider block pointing it at the same store and root
 * key this process writes to.
 *
 * @example
 * ```ts
 * buildProviderStaticConfig({ backend: "etcd", url: "http://127.0.0.1:2379", traefikPrefix: "/traefik" })
 * // { providers: { etcd: { endpoints: ["127.0.0.1:2379"], rootKey: "/traefik" } } }
 * ```
 */
export function buildProviderStaticConfig(input: ProviderStaticConfigInput): ProviderStaticConfig {
  const endpoints = input.url.split(",").map((url) => new URL(url.trim()).host)

  const { username, password } = input

  // Credentials go in as a pair or not at all.
  const credentials = username && password ? { username, password } : {}

  const provider: ProviderConfig = { endpoints, rootKey: input.traefikPrefix, ...credentials }

  return {
    providers: input.backend === "etcd" ? { etcd: provider } : { redis: provider },
  }
}
