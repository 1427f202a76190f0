/**
 * Proxy-facing key paths for one route. Written and deleted together with
 * the route's own keys.
 */
export type RouteKeys = {
  serviceAlias: string
  serviceUrlPath: string
  routerAlias: string
  routerServicePath: string
  routerRulePath: string
}
