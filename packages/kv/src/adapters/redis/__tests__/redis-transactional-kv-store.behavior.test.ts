import { put } from "../../../core/op"
import { FakeRedisClient } from "../../../tests/utils/fake-redis-client"
import { bytes, keys } from "../../../tests/utils/kv-test-helpers"
import { RedisTransactionalKeyValueStore } from "../redis-transactional-kv-store"

describe("RedisTransactionalKeyValueStore (behavior)", () => {
  let client: FakeRedisClient
  let store: RedisTransactionalKeyValueStore

  beforeEach(() => {
    client = new FakeRedisClient()
    store = new RedisTransactionalKeyValueStore(client, { scanCount: 2 })
  })

  it("follows the SCAN cursor until it returns to 0", async () => {
    await store.transaction([
      put("/hub/routes/a", bytes.a()),
      put("/hub/routes/b", bytes.a()),
      put("/hub/routes/c", bytes.a()),
      put("/hub/routes/d", bytes.a()),
      put("/hub/routes/e", bytes.a()),
    ])

    const entries = await store.getPrefix("/hub/routes/")

    expect(entries.map(([key]) => key)).toStrictEqual([
      "/hub/routes/a",
      "/hub/routes/b",
      "/hub/routes/c",
      "/hub/routes/d",
      "/hub/routes/e",
    ])
    expect(client.scanCalls).toStrictEqual([
      { cursor: "0", count: 2 },
      { cursor: "2", count: 2 },
      { cursor: "4", count: 2 },
    ])
  })

  it("escapes glob characters in the prefix", async () => {
    await store.transaction([put("/a*b/x", bytes.a()), put("/aZb/x", bytes.b())])

    expect(await store.getPrefix("/a*b/")).toStrictEqual([["/a*b/x", bytes.a()]])
  })

  it("reports an aborted EXEC as succeeded: false", async () => {
    client.abortNext()

    const result = await store.transaction([put(keys.one(), bytes.a())])

    expect(result).toStrictEqual({ succeeded: false, response: { backend: "redis", raw: null } })
    expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
  })

  it("wraps client failures as backend_unavailable", async () => {
    client.failWith(new Error("Socket closed unexpectedly"))

    await expect(store.transaction([put(keys.one(), bytes.a())])).rejects.toMatchObject({
      code: "backend_unavailable",
      context: { backend: "redis", operation: "transaction" },
    })
  })

  it("quits an open client once on close", async () => {
    await store.close()
    await store.close()

    expect(client.quitCalls).toBe(1)
  })

  it("does not quit a client that was never opened", async () => {
    client.isOpen = false

    await store.close()

    expect(client.quitCalls).toBe(0)
  })
})
