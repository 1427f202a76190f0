/**
 * A source of raw configuration values.
 *
 * Sources only load; validation, coercion and merging happen in `loadConfig`.
 * Later sources override earlier ones.
 */
export interface ConfigSource {
  /** Shown in validation errors, e.g. "env:ROUTEPLANE_*", "json:routeplane.json". */
  readonly name: string

  /**
   * A key mapped to `undefined` counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}
