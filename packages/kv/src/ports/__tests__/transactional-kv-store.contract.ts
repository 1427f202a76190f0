import { KvError } from "../../core/errors/kv-error"
import { del, put } from "../../core/op"
import { bytes, keys, text } from "../../tests/utils/kv-test-helpers"
import type { TransactionalKeyValueStore } from "../transactional-kv-store"

type CreateStore = () => TransactionalKeyValueStore

export function describeTransactionalKvStoreContract(
  adapterName: string,
  createStore: CreateStore,
): void {
  describe(`TransactionalKeyValueStore Contract Tests - ${adapterName}`, () => {
    let store: TransactionalKeyValueStore

    beforeEach(() => {
      store = createStore()
    })

    describe("get", () => {
      it("returns not_found when key is absent", async () => {
        expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
      })

      it("returns the bytes written by a transaction", async () => {
        await store.transaction([put(keys.one(), bytes.a())])

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
      })

      it("keeps empty values distinct from missing keys", async () => {
        await store.transaction([put(keys.one(), bytes.empty())])

        expect(await store.get(keys.one())).toStrictEqual({
          kind: "found",
          value: bytes.empty(),
        })
      })

      it("is not affected by later mutation of the written array", async () => {
        const value = bytes.a()

        await store.transaction([put(keys.one(), value)])
        value[0] = 42

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
      })
    })

    describe("transaction", () => {
      it("applies every put of the batch", async () => {
        const result = await store.transaction([
          put(keys.one(), bytes.a()),
          put(keys.two(), bytes.b()),
          put(keys.three(), text("http://10.0.0.5:8888")),
        ])

        expect(result.succeeded).toBe(true)
        expect(result.response.backend).toBe(store.backend)
        expect(await store.get(keys.two())).toStrictEqual({ kind: "found", value: bytes.b() })
        expect(await store.get(keys.three())).toStrictEqual({
          kind: "found",
          value: text("http://10.0.0.5:8888"),
        })
      })

      it("overwrites existing values", async () => {
        await store.transaction([put(keys.one(), bytes.a())])
        await store.transaction([put(keys.one(), bytes.b())])

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.b() })
      })

      it("applies ops in order within a batch", async () => {
        await store.transaction([put(keys.one(), bytes.a()), del(keys.one())])

        expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
      })

      it("treats deleting a missing key as a no-op", async () => {
        await store.transaction([put(keys.one(), bytes.a())])

        const result = await store.transaction([del(keys.two()), del(keys.three())])

        expect(result.succeeded).toBe(true)
        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
      })

      it("accepts an empty batch", async () => {
        const result = await store.transaction([])

        expect(result.succeeded).toBe(true)
      })
    })

    describe("getPrefix", () => {
      it("returns an empty array when nothing matches", async () => {
        expect(await store.getPrefix("/hub/routes/")).toStrictEqual([])
      })

      it("returns only matching keys, sorted by key", async () => {
        await store.transaction([
          put(keys.two(), bytes.b()),
          put(keys.outside(), bytes.a()),
          put(keys.three(), bytes.a()),
          put(keys.one(), bytes.a()),
        ])

        expect(await store.getPrefix("/hub/routes/")).toStrictEqual([
          [keys.one(), bytes.a()],
          [keys.two(), bytes.b()],
        ])
      })

      it("returns a snapshot unaffected by later writes", async () => {
        await store.transaction([put(keys.one(), bytes.a())])

        const snapshot = await store.getPrefix("/hub/")
        await store.transaction([del(keys.one()), put(keys.two(), bytes.b())])

        expect(snapshot).toStrictEqual([[keys.one(), bytes.a()]])
      })
    })

    describe("close", () => {
      it("rejects operations after close with store_closed", async () => {
        await store.close()

        await expect(store.get(keys.one())).rejects.toBeInstanceOf(KvError)
        await expect(store.getPrefix("/hub/")).rejects.toMatchObject({ code: "store_closed" })
        await expect(store.transaction([put(keys.one(), bytes.a())])).rejects.toMatchObject({
          code: "store_closed",
        })
      })

      it("tolerates a second close", async () => {
        await store.close()

        await expect(store.close()).resolves.toBeUndefined()
      })
    })
  })
}
