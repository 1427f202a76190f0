import { callBackend, KvError, type KvOperation } from "../../core/errors/kv-error"
import type { KvKey } from "../../ports/kv-key"
import type { KvOp } from "../../ports/kv-op"
import type { KvResult } from "../../ports/kv-result"
import type { KvTxnResult } from "../../ports/kv-txn"
import type { KvEntry } from "../../ports/kv-value"
import type { TransactionalKeyValueStore } from "../../ports/transactional-kv-store"
import type { RedisBytesClient } from "./redis-client"

export type RedisKvStoreOptions = {
  /**
   * COUNT hint passed to each SCAN call of a prefix read.
   */
  scanCount: number
}

const GLOB_SPECIAL = /[*?[\]\\]/g

export class RedisTransactionalKeyValueStore implements TransactionalKeyValueStore {
  readonly backend = "redis"

  private closed = false

  public constructor(
    private readonly client: RedisBytesClient,
    private readonly opts: RedisKvStoreOptions = { scanCount: 500 },
  ) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    this.assertOpen("get")

    const buffer = await callBackend(this.backend, "get", () => this.client.get(key))

    if (buffer === null) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(buffer) }
  }

  /**
   * SCAN for matching keys, then one MGET.
   *
   * @remarks
   * Redis has no snapshot reads: a key deleted between the two steps is
   * left out rather than reported.
   */
  async getPrefix(prefix: KvKey): Promise<KvEntry<Uint8Array>[]> {
    this.assertOpen("getPrefix")

    return await callBackend(this.backend, "getPrefix", async () => {
      const keys = await this.scanKeys(prefix)

      if (keys.length === 0) return []

      const buffers = await this.client.mGet(keys)
      const out: KvEntry<Uint8Array>[] = []

      for (const [i, key] of keys.entries()) {
        const buffer = buffers[i]
        if (buffer !== null && buffer !== undefined) {
          out.push([key, new Uint8Array(buffer)])
        }
      }

      return out
    })
  }

  /**
   * MULTI/EXEC. Redis does not roll back a queued command that fails at
   * run time; an aborted EXEC reports `succeeded: false`.
   */
  async transaction(ops: readonly KvOp[]): Promise<KvTxnResult> {
    this.assertOpen("transaction")

    const reply = await callBackend(this.backend, "transaction", () => {
      const tx = this.client.multi()

      for (const op of ops) {
        if (op.kind === "put") {
          tx.set(op.key, this.toBuffer(op.value))
        } else {
          tx.del(op.key)
        }
      }

      return tx.exec()
    })

    return { succeeded: reply !== null, response: { backend: this.backend, raw: reply } }
  }

  async close(): Promise<void> {
    if (this.closed) return

    this.closed = true

    if (this.client.isOpen) {
      await callBackend(this.backend, "close", () => this.client.quit())
    }
  }

  private async scanKeys(prefix: KvKey): Promise<string[]> {
    const match = `${prefix.replace(GLOB_SPECIAL, "\\$&")}*`
    const found = new Set<string>()
    let cursor = "0"

    do {
      const page = await this.client.scan(cursor, { MATCH: match, COUNT: this.opts.scanCount })

      cursor = page.cursor.toString()
      for (const key of page.keys) {
        found.add(key.toString())
      }
    } while (cursor !== "0")

    return [...found].sort()
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
