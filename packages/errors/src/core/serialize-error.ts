import type { SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean

  /**
   * Causes nested deeper than this are dropped.
   * @default 5
   */
  maxCauseDepth?: number
}>

const MAX_VALUE_DEPTH = 8

/**
 * Turns any thrown value into a JSON-safe {@link SerializedError}.
 *
 * Structured errors keep their code, flags and context; other `Error`s get
 * code "unknown" and are marked non-operational; anything else is wrapped
 * as "NonErrorThrown". Byte arrays in the context (raw backend replies) are
 * reduced to their length.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  return serializeAt(err, options, 0)
}

function serializeAt(err: unknown, options: SerializeOptions, depth: number): SerializedError {
  const cause = err instanceof Error ? err.cause : undefined
  const stack = options.includeStack && err instanceof Error ? err.stack : undefined

  return {
    ...summarize(err),
    ...(cause !== undefined &&
      depth < (options.maxCauseDepth ?? 5) && { cause: serializeAt(cause, options, depth + 1) }),
    ...(stack !== undefined && { stack }),
  }
}

function summarize(err: unknown): SerializedError {
  if (isAppError(err)) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: jsonSafeRecord(err.context, 0),
      isOperational: err.isOperational,
      isRetryable: err.isRetryable,
      timestamp: err.timestamp.toISOString(),
    }
  }

  const unstructured = {
    code: "unknown",
    isOperational: false,
    isRetryable: false,
    timestamp: new Date().toISOString(),
  }

  if (err instanceof Error) {
    return { ...unstructured, name: err.name, message: err.message, context: {} }
  }

  if (typeof err === "string") {
    return { ...unstructured, name: "NonErrorThrown", message: err, context: {} }
  }

  return {
    ...unstructured,
    name: "NonErrorThrown",
    message: "Unknown error",
    context: { value: jsonSafe(err, 0) },
  }
}

function jsonSafeRecord(record: Readonly<Record<string, unknown>>, depth: number): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, jsonSafe(value, depth + 1)]))
}

function jsonSafe(value: unknown, depth: number): unknown {
  if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`
  if (typeof value === "bigint") return value.toString()
  if (typeof value !== "object" || value === null || value instanceof Date) return value
  if (depth >= MAX_VALUE_DEPTH) return "[truncated]"
  if (Array.isArray(value)) return value.map((item: unknown) => jsonSafe(item, depth + 1))

  return jsonSafeRecord({ ...value }, depth)
}
