/**
 * A route key decoded back into its logical parts, plus the key holding the
 * target's data.
 */
export type DecodedRouteKey = {
  routespec: string
  target: string
  targetKey: string
}

export type RouteEntry = {
  routespec: string
  target: string

  /** `null` when the target's data key is missing. */
  data: Uint8Array | null
}
