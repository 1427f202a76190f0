export {
  ENV_PREFIX,
  type LoadRoutePlaneConfigOptions,
  loadRoutePlaneConfig,
  mapEnvToConfig,
} from "./config/load-route-plane-config"
export { type EnvConfig, envSchema, type RoutePlaneConfig } from "./config/schema"
export { ESCAPE_CHAR, escape, unescape } from "./core/escape"
export { flattenForKv } from "./core/flatten"
export { KeyCodec, type KeyCodecOptions } from "./core/key-codec"
export { RouteError, type RouteErrorCode } from "./core/route-errors"
export {
  generateAlias,
  generateRouteKeys,
  generateRule,
  isHostRoutespec,
  normalizeRoutespec,
} from "./core/route-rules"
export {
  type DeleteRouteResult,
  RouteStore,
  type RouteStoreDeps,
  type RouteStoreOptions,
  type SharedTargetPolicy,
} from "./core/route-store"
export { type RouteRecord, RouteTable, type RouteTableDeps } from "./core/route-table"
export {
  buildProviderStaticConfig,
  type ProviderConfig,
  type ProviderStaticConfig,
  type ProviderStaticConfigInput,
} from "./core/static-config"
export { type CreateRouteStoreDeps, createRouteStore } from "./create-route-store"
export type { DynamicConfig, DynamicConfigValue } from "./ports/dynamic-config"
export type { DecodedRouteKey, RouteEntry } from "./ports/route-entry"
export type { RouteKeys } from "./ports/route-keys"
