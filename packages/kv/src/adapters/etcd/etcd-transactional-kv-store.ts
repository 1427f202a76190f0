import { callBackend, KvError, type KvOperation } from "../../core/errors/kv-error"
import type { KvKey } from "../../ports/kv-key"
import type { KvOp } from "../../ports/kv-op"
import type { KvResult } from "../../ports/kv-result"
import type { KvTxnResult } from "../../ports/kv-txn"
import type { KvEntry } from "../../ports/kv-value"
import type { TransactionalKeyValueStore } from "../../ports/transactional-kv-store"
import type { EtcdBytesClient, EtcdRequestOp } from "./etcd-client"

export class EtcdTransactionalKeyValueStore implements TransactionalKeyValueStore {
  readonly backend = "etcd"

  private closed = false

  public constructor(private readonly client: EtcdBytesClient) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    this.assertOpen("get")

    const buffer = await callBackend(this.backend, "get", () => this.client.get(key).buffer())

    if (buffer === null) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(buffer) }
  }

  async getPrefix(prefix: KvKey): Promise<KvEntry<Uint8Array>[]> {
    this.assertOpen("getPrefix")

    const buffers = await callBackend(this.backend, "getPrefix", () =>
      this.client.getAll().prefix(prefix).buffers(),
    )

    return Object.entries(buffers)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, buffer]): KvEntry<Uint8Array> => [key, new Uint8Array(buffer)])
  }

  /**
   * One etcd Txn with an empty compare list, so the ops always run as the
   * success branch.
   */
  async transaction(ops: readonly KvOp[]): Promise<KvTxnResult> {
    this.assertOpen("transaction")

    const reply = await callBackend(this.backend, "transaction", () =>
      this.client.kv.txn({ success: ops.map((op) => this.toRequestOp(op)) }),
    )

    return {
      succeeded: reply.succeeded,
      response: { backend: this.backend, revision: reply.header.revision, raw: reply },
    }
  }

  async close(): Promise<void> {
    if (this.closed) return

    this.closed = true
    this.client.close()
  }

  private toRequestOp(op: KvOp): EtcdRequestOp {
    if (op.kind === "put") {
      return { request_put: { key: Buffer.from(op.key), value: this.toBuffer(op.value) } }
    }

    return { request_delete_range: { key: Buffer.from(op.key) } }
  }

  private toBuffer(value: Uint8Array): Buffer {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
  }

  private assertOpen(operation: KvOperation): void {
    if (this.closed) {
      throw KvError.storeClosed({ backend: this.backend, operation })
    }
  }
}
