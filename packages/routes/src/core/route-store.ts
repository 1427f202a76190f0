import {
  del,
  type KvEntry,
  type KvOp,
  type KvTxnResult,
  put,
  type TransactionalKeyValueStore,
  utf8Codec,
} from "@routeplane/kv"
import type { Logger } from "@routeplane/logger"
import type { DynamicConfig } from "../ports/dynamic-config"
import type { RouteEntry } from "../ports/route-entry"
import type { RouteKeys } from "../ports/route-keys"
import { flattenForKv } from "./flatten"
import type { KeyCodec } from "./key-codec"

/**
 * What deleting a route does with its target's data key.
 *
 * - `unconditional`: always deleted, even when another route still points
 *   at the same target.
 * - `retain-shared`: kept while any other route maps to the same target.
 */
export type SharedTargetPolicy = "unconditional" | "retain-shared"

export type RouteStoreDeps = {
  /** Usually a `SerialKeyValueStore`; the route store closes it. */
  store: TransactionalKeyValueStore
  codec: KeyCodec
  logger: Logger
}

export type RouteStoreOptions = {
  traefikPrefix: string

  /** @default "unconditional" */
  sharedTargetPolicy?: SharedTargetPolicy
}

export type DeleteRouteResult = KvTxnResult | { succeeded: true; response: null }

/**
 * Atomic route writes and consistent route reads over a shared
 * transactional KV store.
 *
 * @remarks
 * Writes carry no compare guards: concurrent writers to the same routespec
 * race and the last transaction wins. A result with `succeeded: false` means
 * nothing changed; it is returned, not thrown.
 */
export class RouteStore {
  readonly traefikPrefix: string
  readonly sharedTargetPolicy: SharedTargetPolicy

  private readonly logger: Logger

  constructor(
    private readonly deps: RouteStoreDeps,
    opts: RouteStoreOptions,
  ) {
    this.traefikPrefix = opts.traefikPrefix
    this.sharedTargetPolicy = opts.sharedTargetPolicy ?? "unconditional"
    this.logger = deps.logger.child({ module: "route-store", backend: deps.store.backend })
  }

  get codec(): KeyCodec {
    return this.deps.codec
  }

  async addRoute(
    routespec: string,
    target: string,
    data: Uint8Array,
    routeKeys: RouteKeys,
    rule: string,
  ): Promise<KvTxnResult> {
    const routeKey = this.codec.routeKey(routespec)

    const ops: KvOp[] = [
      put(routeKey, utf8Codec.encode(target)),
      put(this.codec.targetKey(target), data),
      put(routeKeys.serviceUrlPath, utf8Codec.encode(target)),
      put(routeKeys.routerServicePath, utf8Codec.encode(routeKeys.serviceAlias)),
      put(routeKeys.routerRulePath, utf8Codec.encode(rule)),
    ]

    this.logger.debug("Adding route", { routespec, target, key: routeKey })

    return await this.submit(ops, { routespec, target })
  }

  async deleteRoute(routespec: string, routeKeys: RouteKeys): Promise<DeleteRouteResult> {
    const routeKey = this.codec.routeKey(routespec)
    const target = await this.getTarget(routespec)

    if (target === null) {
      this.logger.warn("Route does not exist, nothing to delete", { routespec, key: routeKey })
      return { succeeded: true, response: null }
    }

    const retainTarget =
      this.sharedTargetPolicy === "retain-shared" &&
      (await this.isTargetShared(target, routeKey))

    const ops: KvOp[] = [
      del(routeKey),
      ...(retainTarget ? [] : [del(this.codec.targetKey(target))]),
      del(routeKeys.serviceUrlPath),
      del(routeKeys.routerServicePath),
      del(routeKeys.routerRulePath),
    ]

    this.logger.debug("Deleting route", { routespec, target, key: routeKey })

    return await this.submit(ops, { routespec, target })
  }

  async getTarget(routespec: string): Promise<string | null> {
    const routeKey = this.codec.routeKey(routespec)
    const res = await this.deps.store.get(routeKey)

    if (res.kind === "not_found") return null

    return this.codec.decodeRouteEntry(routeKey, res.value).target
  }

  async getData(target: string): Promise<Uint8Array | null> {
    const res = await this.deps.store.get(this.codec.targetKey(target))

    return res.kind === "found" ? res.value : null
  }

  /**
   * Materializes one entry of {@link listRoutes}, reading the target's data.
   */
  async decodeRouteEntry(entry: KvEntry<Uint8Array>): Promise<RouteEntry> {
    const [rawKey, rawValue] = entry
    const decoded = this.codec.decodeRouteEntry(rawKey, rawValue)
    const res = await this.deps.store.get(decoded.targetKey)

    return {
      routespec: decoded.routespec,
      target: decoded.target,
      data: res.kind === "found" ? res.value : null,
    }
  }

  /**
   * Raw route mappings as one snapshot array.
   */
  async listRoutes(): Promise<KvEntry<Uint8Array>[]> {
    const prefix = this.codec.routesPrefix()
    const entries = await this.deps.store.getPrefix(prefix)

    this.logger.debug("Listed routes", { key: prefix, opCount: entries.length })

    return entries
  }

  /**
   * Writes every leaf of `config` under the traefik prefix in one
   * transaction. Keys missing from `config` are left in place.
   */
  async persistDynamicConfig(config: DynamicConfig): Promise<KvTxnResult> {
    const pairs = flattenForKv(config, this.traefikPrefix, this.codec.separator)
    const ops = pairs.map(([key, value]) => put(key, utf8Codec.encode(value)))

    this.logger.debug("Persisting dynamic config", { key: this.traefikPrefix })

    return await this.submit(ops, {})
  }

  async close(): Promise<void> {
    await this.deps.store.close()
  }

  private async isTargetShared(target: string, routeKey: string): Promise<boolean> {
    const entries = await this.deps.store.getPrefix(this.codec.routesPrefix())

    return entries.some(
      ([key, value]) => key !== routeKey && this.codec.decodeRouteEntry(key, value).target === target,
    )
  }

  private async submit(
    ops: KvOp[],
    meta: { routespec?: string; target?: string },
  ): Promise<KvTxnResult> {
    const result = await this.deps.store.transaction(ops)
    const revision = result.response.revision

    const logMeta = {
      ...meta,
      opCount: ops.length,
      ...(revision !== undefined && { revision }),
    }

    if (result.succeeded) {
      this.logger.debug("Transaction committed", logMeta)
    } else {
      this.logger.warn("Transaction reported failure", logMeta)
    }

    return result
  }
}
