import type { KvBackendName } from "@routeplane/kv"
import { type LogLevelName, logLevelNames } from "@routeplane/logger"
import { z } from "zod"
import type { SharedTargetPolicy } from "../core/route-store"

export const envSchema = z
  .object({
    KV_BACKEND: z.enum(["etcd", "redis", "memory"]).default("etcd"),
    KV_URL: z.string().default("http://127.0.0.1:2379"),
    KV_USERNAME: z.string().optional(),
    KV_PASSWORD: z.string().optional(),

    ETCD_CA_CERT: z.string().optional(),
    ETCD_CERT_CRT: z.string().optional(),
    ETCD_CERT_KEY: z.string().optional(),

    JUPYTERHUB_PREFIX: z.string().default("/jupyterhub"),
    TRAEFIK_PREFIX: z.string().default("/traefik"),
    KV_SEPARATOR: z
      .string()
      .default("/")
      .refine((value) => value.length > 0 && !/[A-Za-z0-9_]/.test(value), {
        message: "must be non-empty and contain no letters, digits or _",
      }),

    SHARED_TARGET_POLICY: z.enum(["unconditional", "retain-shared"]).default("unconditional"),

    LOG_LEVEL: z.enum(logLevelNames).default("info"),
    LOG_PRETTY: z.stringbool().default(false),
    SERVICE_NAME: z.string().default("routeplane"),
  })
  .refine((env) => (env.ETCD_CERT_CRT === undefined) === (env.ETCD_CERT_KEY === undefined), {
    message: "ETCD_CERT_CRT and ETCD_CERT_KEY must be set together",
    path: ["ETCD_CERT_KEY"],
  })

export type EnvConfig = z.infer<typeof envSchema>

export type RoutePlaneConfig = {
  kv: {
    backend: KvBackendName
    url: string
    username?: string
    password?: string
    tls: {
      caCertFile?: string
      certChainFile?: string
      privateKeyFile?: string
    }
  }
  keys: {
    jupyterhubPrefix: string
    traefikPrefix: string
    separator: string
  }
  routes: {
    sharedTargetPolicy: SharedTargetPolicy
  }
  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}
