import { BaseError, isAppError } from "@routeplane/errors"
import type { KvBackendName } from "../../ports/kv-txn"

export type KvErrorCode = "backend_unavailable" | "store_closed"

export type KvOperation = "connect" | "get" | "getPrefix" | "transaction" | "close"

export class KvError extends BaseError<KvErrorCode> {
  static backendUnavailable(input: {
    backend: KvBackendName
    operation: KvOperation
    cause: unknown
  }): KvError {
    const reason = input.cause instanceof Error ? input.cause.message : String(input.cause)

    return new KvError(`${input.backend} ${input.operation} failed: ${reason}`, {
      code: "backend_unavailable",
      context: { backend: input.backend, operation: input.operation },
      cause: input.cause,
      isRetryable: true,
    })
  }

  static storeClosed(input: { backend: KvBackendName; operation: KvOperation }): KvError {
    return new KvError(`${input.backend} store is closed (${input.operation})`, {
      code: "store_closed",
      context: { backend: input.backend, operation: input.operation },
      isRetryable: false,
    })
  }
}

/**
 * Runs a client call, turning anything the client throws into
 * `backend_unavailable`. Structured errors pass through as they are.
 */
export async function callBackend<T>(
  backend: KvBackendName,
  operation: KvOperation,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    if (isAppError(err)) throw err

    throw KvError.backendUnavailable({ backend, operation, cause: err })
  }
}
