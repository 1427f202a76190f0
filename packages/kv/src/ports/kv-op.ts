import type { KvKey } from "./kv-key"

export type KvPut = {
  readonly kind: "put"
  readonly key: KvKey
  readonly value: Uint8Array
}

export type KvDelete = {
  readonly kind: "delete"
  readonly key: KvKey
}

/**
 * One action inside a transaction. Deleting a missing key is a no-op.
 */
export type KvOp = KvPut | KvDelete
