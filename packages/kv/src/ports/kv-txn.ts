export type KvBackendName = "memory" | "etcd" | "redis"

export type KvTxnResponse = {
  readonly backend: KvBackendName

  /**
   * Store revision after the transaction, when the backend reports one.
   */
  readonly revision?: string

  /**
   * The backend's own reply, kept for diagnostics only.
   */
  readonly raw?: unknown
}

export type KvTxnResult = {
  readonly succeeded: boolean
  readonly response: KvTxnResponse
}
