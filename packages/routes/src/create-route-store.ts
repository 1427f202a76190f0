import {
  callBackend,
  createEtcdClient,
  createRedisClient,
  type EtcdBytesClient,
  EtcdTransactionalKeyValueStore,
  MemoryTransactionalKeyValueStore,
  type RedisBytesClient,
  RedisTransactionalKeyValueStore,
  SerialKeyValueStore,
  type TransactionalKeyValueStore,
} from "@routeplane/kv"
import { createPinoLogger, type Logger } from "@routeplane/logger"
import type { RoutePlaneConfig } from "./config/schema"
import { KeyCodec } from "./core/key-codec"
import { RouteStore } from "./core/route-store"

export type CreateRouteStoreDeps = {
  logger?: Logger

  /** Used instead of building a client from `config.kv`. */
  etcdClient?: EtcdBytesClient
  redisClient?: RedisBytesClient
}

/**
 * Builds the backend client, the serial wrapper and the route store once,
 * at startup. Closing the returned store closes the client.
 */
export async function createRouteStore(
  config: RoutePlaneConfig,
  deps: CreateRouteStoreDeps = {},
): Promise<RouteStore> {
  const logger =
    deps.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName },
    )

  const backend = await createBackendStore(config, deps)

  logger.info("Route store ready", {
    backend: backend.backend,
    key: config.keys.jupyterhubPrefix,
  })

  return new RouteStore(
    {
      store: new SerialKeyValueStore(backend),
      codec: new KeyCodec({
        jupyterhubPrefix: config.keys.jupyterhubPrefix,
        separator: config.keys.separator,
      }),
      logger,
    },
    {
      traefikPrefix: config.keys.traefikPrefix,
      sharedTargetPolicy: config.routes.sharedTargetPolicy,
    },
  )
}

async function createBackendStore(
  config: RoutePlaneConfig,
  deps: CreateRouteStoreDeps,
): Promise<TransactionalKeyValueStore> {
  const { kv } = config

  switch (kv.backend) {
    case "memory":
      return new MemoryTransactionalKeyValueStore()

    case "etcd": {
      const client =
        deps.etcdClient ??
        (await createEtcdClient({
          url: kv.url,
          ...(kv.username !== undefined && { username: kv.username }),
          ...(kv.password !== undefined && { password: kv.password }),
          ...(kv.tls.caCertFile !== undefined && { caCertFile: kv.tls.caCertFile }),
          ...(kv.tls.certChainFile !== undefined && { certChainFile: kv.tls.certChainFile }),
          ...(kv.tls.privateKeyFile !== undefined && { privateKeyFile: kv.tls.privateKeyFile }),
        }))

      return new EtcdTransactionalKeyValueStore(client)
    }

    case "redis": {
      const client =
        deps.redisClient ??
        createRedisClient({
          url: kv.url,
          ...(kv.username !== undefined && { username: kv.username }),
          ...(kv.password !== undefined && { password: kv.password }),
        })

      if (!client.isOpen) {
        await callBackend("redis", "connect", () => client.connect())
      }

      return new RedisTransactionalKeyValueStore(client)
    }
  }
}
