import {
  type ConfigSource,
  EnvSource,
  JsonSource,
  loadConfig,
  ObjectSource,
} from "@routeplane/config"
import { type EnvConfig, envSchema, type RoutePlaneConfig } from "./schema"

export const ENV_PREFIX = "ROUTEPLANE_"

export function mapEnvToConfig(env: EnvConfig): RoutePlaneConfig {
  return {
    kv: {
      backend: env.KV_BACKEND,
      url: env.KV_URL,
      ...(env.KV_USERNAME !== undefined && { username: env.KV_USERNAME }),
      ...(env.KV_PASSWORD !== undefined && { password: env.KV_PASSWORD }),
      tls: {
        ...(env.ETCD_CA_CERT !== undefined && { caCertFile: env.ETCD_CA_CERT }),
        ...(env.ETCD_CERT_CRT !== undefined && { certChainFile: env.ETCD_CERT_CRT }),
        ...(env.ETCD_CERT_KEY !== undefined && { privateKeyFile: env.ETCD_CERT_KEY }),
      },
    },
    keys: {
      jupyterhubPrefix: env.JUPYTERHUB_PREFIX,
      traefikPrefix: env.TRAEFIK_PREFIX,
      separator: env.KV_SEPARATOR,
    },
    routes: {
      sharedTargetPolicy: env.SHARED_TARGET_POLICY,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

export type LoadRoutePlaneConfigOptions = {
  /** Optional JSON file with the same keys as the environment, unprefixed. */
  file?: string
  cwd?: string
  overrides?: Record<string, unknown>
}

/**
 * Reads settings from an optional JSON file, then `ROUTEPLANE_*` environment
 * variables, then overrides; later sources win.
 */
export async function loadRoutePlaneConfig(
  env: Record<string, string | undefined> = process.env,
  options: LoadRoutePlaneConfigOptions = {},
): Promise<RoutePlaneConfig> {
  const sources: ConfigSource[] = []

  if (options.file !== undefined) {
    sources.push(
      new JsonSource({
        file: options.file,
        required: false,
        ...(options.cwd !== undefined && { cwd: options.cwd }),
      }),
    )
  }

  sources.push(new EnvSource({ prefix: ENV_PREFIX, env }))

  if (options.overrides !== undefined) {
    sources.push(new ObjectSource(options.overrides))
  }

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
