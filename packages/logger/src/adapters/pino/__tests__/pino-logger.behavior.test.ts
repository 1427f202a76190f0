import { Writable } from "node:stream"
import { BaseError } from "@routeplane/errors"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parse(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "{}") as Record<string, unknown>
}

describe("PinoLogger behavior", () => {
  it("emits JSON with bindings and meta to the destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { service: "routeplane" })

    logger.info("route added", { routespec: "/user/alice/" })

    expect(lines).toHaveLength(1)

    const payload = parse(lines[0])

    expect(payload).toMatchObject({
      msg: "route added",
      service: "routeplane",
      routespec: "/user/alice/",
      level: 30,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() inherits the parent sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "routeplane" })
    const child = base.child({ module: "route-store" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({
      msg: "logged",
      service: "routeplane",
      module: "route-store",
    })
  })

  it("serializes a structured err with its code, context and cause", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    const err = new BaseError("etcd transaction failed: ECONNREFUSED", {
      code: "backend_unavailable",
      context: { backend: "etcd", operation: "transaction" },
      cause: new Error("ECONNREFUSED"),
      isRetryable: true,
    })

    logger.error("Route store failed", { err })

    expect(parse(lines[0]).err).toMatchObject({
      name: "BaseError",
      code: "backend_unavailable",
      message: "etcd transaction failed: ECONNREFUSED",
      context: { backend: "etcd", operation: "transaction" },
      isRetryable: true,
      cause: { name: "Error", code: "unknown", message: "ECONNREFUSED" },
    })
    expect(parse(lines[0]).err).toHaveProperty("stack")
  })

  it("serializes a plain Error with pino's serializer", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    logger.error("Route store failed", { err: new Error("socket hang up") })

    expect(parse(lines[0]).err).toMatchObject({ type: "Error", message: "socket hang up" })
  })
})
