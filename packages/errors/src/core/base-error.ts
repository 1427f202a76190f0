import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"
import { serializeError } from "./serialize-error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown

  /** @default false */
  isRetryable?: boolean

  /** @default true */
  isOperational?: boolean
}>

/**
 * Root of the `KvError` and `RouteError` hierarchies. Subclasses add static
 * factories that fix the code, flags and context shape for each failure.
 */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp = new Date()

  constructor(message: string, { code, context, cause, isRetryable, isOperational }: BaseErrorOptions<C>) {
    super(message, { cause })

    this.name = new.target.name
    this.code = code
    this.context = Object.freeze({ ...context })
    this.isRetryable = isRetryable ?? false
    this.isOperational = isOperational ?? true

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}
