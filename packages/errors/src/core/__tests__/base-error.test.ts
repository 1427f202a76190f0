import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("applies defaults", () => {
      const err = new BaseError("route missing", { code: "not_found" })

      expect(err.message).toBe("route missing")
      expect(err.code).toBe("not_found")
      expect(err.name).toBe("BaseError")
      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("keeps cause and flags", () => {
      const cause = new Error("connection refused")
      const err = new BaseError("backend down", {
        code: "backend_unavailable",
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("freezes a copy of the context", () => {
      const context = { key: "/jupyterhub/routes/_2F" }
      const err = new BaseError("bad key", { code: "decode_error", context })

      expect(err.context).toEqual(context)
      expect(err.context).not.toBe(context)
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("uses the subclass name", () => {
      class StoreError extends BaseError<"store_closed"> {}

      const err = new StoreError("closed", { code: "store_closed" })

      expect(err.name).toBe("StoreError")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
    })
  })

  it("serializes through toJSON", () => {
    const err = new BaseError("txn failed", {
      code: "transaction_failed",
      context: { opCount: 5 },
      cause: new Error("socket hang up"),
    })

    expect(JSON.parse(JSON.stringify({ err }))).toStrictEqual({
      err: {
        name: "BaseError",
        code: "transaction_failed",
        message: "txn failed",
        context: { opCount: 5 },
        isOperational: true,
        isRetryable: false,
        timestamp: "2024-01-15T10:30:00.000Z",
        cause: {
          name: "Error",
          code: "unknown",
          message: "socket hang up",
          context: {},
          isOperational: false,
          isRetryable: false,
          timestamp: "2024-01-15T10:30:00.000Z",
        },
      },
    })
  })
})
