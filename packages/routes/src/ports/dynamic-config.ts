export type DynamicConfigValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly DynamicConfigValue[]
  | DynamicConfig

/**
 * A nested proxy configuration object, as the proxy would read it from a file.
 */
export interface DynamicConfig {
  readonly [key: string]: DynamicConfigValue
}
