import type { KvKey } from "./kv-key"
import type { KvOp } from "./kv-op"
import type { KvResult } from "./kv-result"
import type { KvTxnResult } from "./kv-txn"
import type { KvEntry } from "./kv-value"

/**
 * A shared byte-oriented KV store with atomic multi-key writes.
 *
 * @remarks
 * - Several processes may talk to the same store; nothing here locks across them.
 * - `transaction` applies every op or none, and readers never observe a
 *   partially applied batch. There are no compare guards: last writer wins.
 * - Connectivity and auth failures reject with `KvError` code
 *   `backend_unavailable`; a backend that answers but refuses the batch
 *   resolves with `succeeded: false`.
 */
export interface TransactionalKeyValueStore {
  readonly backend: KvTxnResult["response"]["backend"]

  get(key: KvKey): Promise<KvResult<Uint8Array>>

  /**
   * Every entry whose key starts with `prefix`, sorted by key.
   *
   * @remarks
   * Returns a finished array, not a cursor.
   */
  getPrefix(prefix: KvKey): Promise<KvEntry<Uint8Array>[]>

  transaction(ops: readonly KvOp[]): Promise<KvTxnResult>

  /**
   * Releases the client. Operations after close reject with `store_closed`.
   */
  close(): Promise<void>
}
