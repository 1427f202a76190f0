import {
  MemoryTransactionalKeyValueStore,
  SerialKeyValueStore,
  type TransactionalKeyValueStore,
  utf8Codec,
} from "@routeplane/kv"
import { KeyCodec } from "../core/key-codec"
import { generateRouteKeys, generateRule } from "../core/route-rules"
import { RouteStore, type SharedTargetPolicy } from "../core/route-store"
import type { RouteKeys } from "../ports/route-keys"
import { RecordingLogger } from "./recording-logger"

export const text = (value: string): Uint8Array => utf8Codec.encode(value)

export type RouteHarness = {
  backend: MemoryTransactionalKeyValueStore
  store: TransactionalKeyValueStore
  logger: RecordingLogger
  routes: RouteStore
}

export function createRouteHarness(
  opts: { sharedTargetPolicy?: SharedTargetPolicy; separator?: string; maxEntries?: number } = {},
): RouteHarness {
  const backend = new MemoryTransactionalKeyValueStore(
    opts.maxEntries === undefined ? {} : { maxEntries: opts.maxEntries },
  )
  const store = new SerialKeyValueStore(backend)
  const logger = new RecordingLogger()
  const codec = new KeyCodec({
    jupyterhubPrefix: "/jupyterhub",
    ...(opts.separator !== undefined && { separator: opts.separator }),
  })

  const routes = new RouteStore(
    { store, codec, logger },
    {
      traefikPrefix: "/traefik",
      ...(opts.sharedTargetPolicy !== undefined && {
        sharedTargetPolicy: opts.sharedTargetPolicy,
      }),
    },
  )

  return { backend, store, logger, routes }
}

export function keysFor(routespec: string): RouteKeys {
  return generateRouteKeys(routespec, "/traefik")
}

export async function addRoute(
  routes: RouteStore,
  routespec: string,
  target: string,
  data: string,
): Promise<void> {
  const result = await routes.addRoute(
    routespec,
    target,
    text(data),
    keysFor(routespec),
    generateRule(routespec),
  )

  expect(result.succeeded).toBe(true)
}

/**
 * Every key in the store with its value as text.
 */
export async function dumpStore(
  store: TransactionalKeyValueStore,
): Promise<[string, string][]> {
  const entries = await store.getPrefix("")

  return entries.map(([key, value]) => [key, utf8Codec.decode(value)])
}
