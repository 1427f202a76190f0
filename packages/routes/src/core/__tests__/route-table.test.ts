import { createRouteHarness, dumpStore, type RouteHarness } from "../../tests/route-test-harness"
import { RouteError } from "../route-errors"
import { RouteTable } from "../route-table"

type RouteData = { last_activity: string | null }

describe("RouteTable", () => {
  let h: RouteHarness
  let table: RouteTable<RouteData>

  beforeEach(() => {
    h = createRouteHarness()
    table = new RouteTable<RouteData>({ routes: h.routes })
  })

  it("normalizes the routespec and stores JSON data", async () => {
    await table.addRoute("/user/alice", "http://10.0.0.5:8888", { last_activity: null })

    expect(await table.getRoute("/user/alice/")).toStrictEqual({
      routespec: "/user/alice/",
      target: "http://10.0.0.5:8888",
      data: { last_activity: null },
    })
    expect(await dumpStore(h.backend)).toContainEqual([
      "/jupyterhub/targets/http_3A_2F_2F10_2E0_2E0_2E5_3A8888",
      '{"last_activity":null}',
    ])
  })

  it("derives the proxy rule for host-based routes", async () => {
    await table.addRoute("hub.test/user/", "http://10.0.0.5:8888", { last_activity: null })

    expect(await dumpStore(h.backend)).toContainEqual([
      "/traefik/http/routers/router_hub_test_user_/rule",
      "Host(`hub.test`) && PathPrefix(`/user/`)",
    ])
  })

  it("returns null for an unknown route", async () => {
    expect(await table.getRoute("/nope/")).toBeNull()
  })

  it("lists all routes keyed by routespec", async () => {
    await table.addRoute("/user/alice/", "http://10.0.0.5:8888", { last_activity: "2024-01-15" })
    await table.addRoute("/", "http://10.0.0.1:8081", { last_activity: null })

    const all = await table.getAllRoutes()

    expect([...all.keys()]).toStrictEqual(["/", "/user/alice/"])
    expect(all.get("/user/alice/")).toStrictEqual({
      routespec: "/user/alice/",
      target: "http://10.0.0.5:8888",
      data: { last_activity: "2024-01-15" },
    })
  })

  it("deletes routes and ignores missing ones", async () => {
    await table.addRoute("/user/alice/", "http://10.0.0.5:8888", { last_activity: null })

    await table.deleteRoute("/user/alice")
    await table.deleteRoute("/user/alice")

    expect(await table.getRoute("/user/alice/")).toBeNull()
    expect(await dumpStore(h.backend)).toStrictEqual([])
  })

  it("throws transaction_failed when the backend refuses a write", async () => {
    vi.spyOn(h.backend, "transaction").mockResolvedValueOnce({
      succeeded: false,
      response: { backend: "memory", raw: "refused" },
    })

    const err = await table
      .addRoute("/user/alice/", "http://10.0.0.5:8888", { last_activity: null })
      .catch((e: unknown) => e)

    expect(err).toBeInstanceOf(RouteError)
    expect(err).toMatchObject({
      code: "transaction_failed",
      message: "addRoute transaction failed for /user/alice/",
      context: {
        operation: "addRoute",
        routespec: "/user/alice/",
        response: { backend: "memory", raw: "refused" },
      },
    })
  })

  it("raises decode_error for data that is not JSON", async () => {
    await h.routes.addRoute(
      "/user/alice/",
      "http://10.0.0.5:8888",
      new TextEncoder().encode("not json"),
      {
        serviceAlias: "s",
        serviceUrlPath: "/traefik/s",
        routerAlias: "r",
        routerServicePath: "/traefik/r/service",
        routerRulePath: "/traefik/r/rule",
      },
      "PathPrefix(`/user/alice/`)",
    )

    await expect(table.getRoute("/user/alice/")).rejects.toMatchObject({
      code: "decode_error",
      context: { key: "/jupyterhub/targets/http_3A_2F_2F10_2E0_2E0_2E5_3A8888" },
    })
  })
})
