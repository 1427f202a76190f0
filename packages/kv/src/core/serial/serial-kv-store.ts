import pLimit, { type LimitFunction } from "p-limit"
import type { KvKey } from "../../ports/kv-key"
import type { KvOp } from "../../ports/kv-op"
import type { KvResult } from "../../ports/kv-result"
import type { KvTxnResult } from "../../ports/kv-txn"
import type { KvEntry } from "../../ports/kv-value"
import type { TransactionalKeyValueStore } from "../../ports/transactional-kv-store"
import { KvError, type KvOperation } from "../errors/kv-error"

/**
 * Funnels every call to the wrapped store through one FIFO slot, so at most
 * one backend operation is in flight for this process.
 *
 * @remarks
 * `close()` is queued behind pending work and closes the inner store once.
 * Operations submitted after it reject with `store_closed`.
 */
export class SerialKeyValueStore implements TransactionalKeyValueStore {
  private readonly limit: LimitFunction = pLimit(1)
  private closing: Promise<void> | null = null

  public constructor(private readonly inner: TransactionalKeyValueStore) {}

  get backend(): TransactionalKeyValueStore["backend"] {
    return this.inner.backend
  }

  get pendingCount(): number {
    return this.limit.pendingCount + this.limit.activeCount
  }

  get(key: KvKey): Promise<KvResult<Uint8Array>> {
    return this.run("get", () => this.inner.get(key))
  }

  getPrefix(prefix: KvKey): Promise<KvEntry<Uint8Array>[]> {
    return this.run("getPrefix", () => this.inner.getPrefix(prefix))
  }

  transaction(ops: readonly KvOp[]): Promise<KvTxnResult> {
    return this.run("transaction", () => this.inner.transaction(ops))
  }

  close(): Promise<void> {
    if (this.closing === null) {
      this.closing = this.limit(() => this.inner.close())
    }

    return this.closing
  }

  private run<T>(operation: KvOperation, fn: () => Promise<T>): Promise<T> {
    if (this.closing !== null) {
      return Promise.reject(KvError.storeClosed({ backend: this.backend, operation }))
    }

    return this.limit(fn)
  }
}
