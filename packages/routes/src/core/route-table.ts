import { type Codec, jsonCodec } from "@routeplane/kv"
import type { RouteKeys } from "../ports/route-keys"
import { RouteError } from "./route-errors"
import { generateRouteKeys, generateRule, normalizeRoutespec } from "./route-rules"
import type { RouteStore } from "./route-store"

export type RouteRecord<TData> = {
  routespec: string
  target: string
  data: TData | null
}

export type RouteTableDeps<TData> = {
  routes: RouteStore

  /** @default jsonCodec() */
  codec?: Codec<TData>
}

/**
 * Caller-facing routing table: normalizes routespecs, derives the proxy's
 * router and service keys, and encodes route data.
 *
 * @remarks
 * Unlike {@link RouteStore}, a write the backend refuses is thrown as
 * `transaction_failed`.
 */
export class RouteTable<TData = Record<string, unknown>> {
  private readonly codec: Codec<TData>

  constructor(private readonly deps: RouteTableDeps<TData>) {
    this.codec = deps.codec ?? jsonCodec<TData>()
  }

  async addRoute(routespec: string, target: string, data: TData): Promise<void> {
    const spec = normalizeRoutespec(routespec)

    const result = await this.deps.routes.addRoute(
      spec,
      target,
      this.codec.encode(data),
      this.routeKeys(spec),
      generateRule(spec),
    )

    if (!result.succeeded) {
      throw RouteError.transactionFailed({
        operation: "addRoute",
        routespec: spec,
        response: result.response,
      })
    }
  }

  /**
   * Deleting a route that does not exist is a no-op.
   */
  async deleteRoute(routespec: string): Promise<void> {
    const spec = normalizeRoutespec(routespec)
    const result = await this.deps.routes.deleteRoute(spec, this.routeKeys(spec))

    if (result.response !== null && !result.succeeded) {
      throw RouteError.transactionFailed({
        operation: "deleteRoute",
        routespec: spec,
        response: result.response,
      })
    }
  }

  async getRoute(routespec: string): Promise<RouteRecord<TData> | null> {
    const spec = normalizeRoutespec(routespec)
    const target = await this.deps.routes.getTarget(spec)

    if (target === null) return null

    const data = await this.deps.routes.getData(target)

    return { routespec: spec, target, data: this.decodeData(data, target) }
  }

  /**
   * Every stored route, keyed by routespec.
   */
  async getAllRoutes(): Promise<Map<string, RouteRecord<TData>>> {
    const out = new Map<string, RouteRecord<TData>>()

    for (const entry of await this.deps.routes.listRoutes()) {
      const route = await this.deps.routes.decodeRouteEntry(entry)

      out.set(route.routespec, {
        routespec: route.routespec,
        target: route.target,
        data: this.decodeData(route.data, route.target),
      })
    }

    return out
  }

  private routeKeys(routespec: string): RouteKeys {
    return generateRouteKeys(
      routespec,
      this.deps.routes.traefikPrefix,
      this.deps.routes.codec.separator,
    )
  }

  private decodeData(data: Uint8Array | null, target: string): TData | null {
    if (data === null) return null

    try {
      return this.codec.decode(data)
    } catch (err) {
      throw RouteError.decodeError({
        reason: "target data cannot be decoded",
        key: this.deps.routes.codec.targetKey(target),
        cause: err,
      })
    }
  }
}
