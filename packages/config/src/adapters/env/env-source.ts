import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with this prefix are read; the prefix is stripped. */
  prefix: string
  env?: Record<string, string | undefined>
}

/**
 * Prefixed environment variables, e.g. `ROUTEPLANE_KV_URL` as `KV_URL`.
 * An empty variable counts as unset, so `ROUTEPLANE_KV_PASSWORD=` falls back
 * to the next source or the default.
 */
export class EnvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: EnvSourceOptions) {
    this.name = `env:${opts.prefix}*`
  }

  async load(): Promise<Record<string, unknown>> {
    const env = this.opts.env ?? process.env

    return Object.fromEntries(
      Object.entries(env)
        .filter(([key, value]) => key.startsWith(this.opts.prefix) && value !== undefined && value !== "")
        .map(([key, value]) => [key.slice(this.opts.prefix.length), value]),
    )
  }
}
