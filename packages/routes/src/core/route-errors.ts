import { BaseError } from "@routeplane/errors"
import type { KvTxnResponse } from "@routeplane/kv"

export type RouteErrorCode = "decode_error" | "invalid_input" | "transaction_failed"

export class RouteError extends BaseError<RouteErrorCode> {
  /**
   * Stored keys or values that do not follow the key scheme. Treated as data
   * corruption, never skipped.
   */
  static decodeError(input: { reason: string; key?: string; segment?: string; cause?: unknown }): RouteError {
    return new RouteError(`Cannot decode route data: ${input.reason}`, {
      code: "decode_error",
      context: {
        ...(input.key !== undefined && { key: input.key }),
        ...(input.segment !== undefined && { segment: input.segment }),
      },
      cause: input.cause,
      isRetryable: false,
      isOperational: false,
    })
  }

  /**
   * A routespec or target that has no key. Raised before anything is written.
   */
  static invalidInput(input: { reason: string; value: string }): RouteError {
    return new RouteError(`Cannot encode route data: ${input.reason}`, {
      code: "invalid_input",
      context: { value: input.value },
      isRetryable: false,
    })
  }

  static transactionFailed(input: {
    operation: "addRoute" | "deleteRoute" | "persistDynamicConfig"
    routespec?: string
    response: KvTxnResponse
  }): RouteError {
    const subject = input.routespec === undefined ? "" : ` for ${input.routespec}`

    return new RouteError(`${input.operation} transaction failed${subject}`, {
      code: "transaction_failed",
      context: {
        operation: input.operation,
        ...(input.routespec !== undefined && { routespec: input.routespec }),
        response: input.response,
      },
      isRetryable: false,
    })
  }
}
