import { type ZodType, z } from "zod"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** Applied in order; a later source overrides an earlier one key by key. */
  sources: ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    const from = sources.map((source) => source.name).join(", ")

    throw new Error(
      `Configuration validation failed (sources: ${from || "none"}):\n${z.prettifyError(result.error)}`,
    )
  }

  return new Config<T>(result.data)
}
