import type { RouteKeys } from "../ports/route-keys"

/**
 * Adds the trailing `/` a routespec must end with. A spec that does not start
 * with `/` is host-based (`host.tld/path/`); the empty spec is the root route.
 */
export function normalizeRoutespec(routespec: string): string {
  if (routespec === "") return "/"

  return routespec.endsWith("/") ? routespec : `${routespec}/`
}

/**
 * True when the routespec starts with a host rather than a path.
 */
export function isHostRoutespec(routespec: string): boolean {
  return !routespec.startsWith("/")
}

export function generateAlias(routespec: string, kind: "service" | "router"): string {
  return `${kind}_${routespec.replace(/[^A-Za-z0-9]/g, "_")}`
}

/**
 * The proxy's match rule for a routespec.
 *
 * @example
 * ```ts
 * generateRule("/user/alice/") // "PathPrefix(`/user/alice/`)"
 * generateRule("hub.test/user/") // "Host(`hub.test`) && PathPrefix(`/user/`)"
 * ```
 */
export function generateRule(routespec: string): string {
  if (!isHostRoutespec(routespec)) {
    return `PathPrefix(\`${routespec}\`)`
  }

  const slash = routespec.indexOf("/")
  const host = slash === -1 ? routespec : routespec.slice(0, slash)
  const path = slash === -1 ? "/" : routespec.slice(slash)

  return `Host(\`${host}\`) && PathPrefix(\`${path}\`)`
}

export function generateRouteKeys(
  routespec: string,
  traefikPrefix: string,
  separator = "/",
): RouteKeys {
  const serviceAlias = generateAlias(routespec, "service")
  const routerAlias = generateAlias(routespec, "router")
  const join = (...segments: string[]) => [traefikPrefix, "http", ...segments].join(separator)

  return {
    serviceAlias,
    serviceUrlPath: join("services", serviceAlias, "loadBalancer", "servers", "0", "url"),
    routerAlias,
    routerServicePath: join("routers", routerAlias, "service"),
    routerRulePath: join("routers", routerAlias, "rule"),
  }
}
