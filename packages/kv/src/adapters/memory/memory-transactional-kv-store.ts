import { KvError, type KvOperation } from "../../core/errors/kv-error"
import type { KvKey } from "../../ports/kv-key"
import type { KvOp } from "../../ports/kv-op"
import type { KvResult } from "../../ports/kv-result"
import type { KvTxnResult } from "../../ports/kv-txn"
import type { KvEntry } from "../../ports/kv-value"
import type { TransactionalKeyValueStore } from "../../ports/transactional-kv-store"

export type MemoryKvStoreOptions = {
  /**
   * Maximum number of entries retained in the store.
   *
   * A transaction that would leave more entries than this is not applied and
   * reports `succeeded: false`.
   */
  maxEntries?: number
}

export class MemoryTransactionalKeyValueStore implements TransactionalKeyValueStore {
  readonly backend = "memory"

  private store = new Map<KvKey, Uint8Array>()
  private revision = 0
  private closed = false

  public constructor(private readonly opts: MemoryKvStoreOptions = {}) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    this.assertOpen("get")

    const value = this.store.get(key)

    if (value === undefined) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(value) }
  }

  async getPrefix(prefix: KvKey): Promise<KvEntry<Uint8Array>[]> {
    this.assertOpen("getPrefix")

    const out: KvEntry<Uint8Array>[] = []

    for (const [key, value] of this.store) {
      if (key.startsWith(prefix)) {
        out.push([key, new Uint8Array(value)])
      }
    }

    return out.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  }

  async transaction(ops: readonly KvOp[]): Promise<KvTxnResult> {
    this.assertOpen("transaction")

    const next = new Map(this.store)

    for (const op of ops) {
      if (op.kind === "put") {
        next.set(op.key, new Uint8Array(op.value))
      } else {
        next.delete(op.key)
      }
    }

    if (this.opts.maxEntries !== undefined && next.size > this.opts.maxEntries) {
      return {
        succeeded: false,
        response: {
          backend: this.backend,
          revision: String(this.revision),
          raw: { reason: "max_entries_exceeded", maxEntries: this.opts.maxEntries },
        },
      }
    }

    this.store = next
    this.revision += 1

    return {
      succeeded: true,
      response: { backend: this.backend, revision: String(this.revision) },
    }
  }

  async close(): Promise<void> {
    this.closed = true
  }

  private assertOpen(operation: KvOperation): void {
    if (this.closed) {
      throw KvError.storeClosed({ backend: this.backend, operation })
    }
  }
}
