export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (keys, backend names, raw responses).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed. */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected runtime failure (`true`) or a broken invariant
   * such as corrupted stored data (`false`).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
