import { Effect, Layer } from "effect"
import { describe, expect, it } from "vitest"
import { makeMockServer, ok, TEST_OPTIONS, type MockHandler } from "../test/mock-server"
import { makeRundeckConfigLayer, type RundeckOptions } from "./config"
import { RundeckConnection } from "./connection"

const setup = (handler: MockHandler, options: RundeckOptions = {}) => {
  const server = makeMockServer(handler)
  const layer = RundeckConnection.Default.pipe(
    Layer.provide(
      Layer.merge(
        makeRundeckConfigLayer({ ...TEST_OPTIONS, ...options }),
        server.layer,
      ),
    ),
  )
  const run = <A, E>(
    use: (connection: RundeckConnection) => Effect.Effect<A, E>,
  ) =>
    Effect.runPromise(
      Effect.flatMap(RundeckConnection, use).pipe(Effect.provide(layer)),
    )

  return { requests: server.requests, run }
}

describe("RundeckConnection", () => {
  it("sends the token, wrapper and accept headers to the API URL", async () => {
    const { requests, run } = setup(() => ok())

    await run((connection) => connection.request("GET", "system/info"))

    const [request] = requests
    expect(request?.method).toBe("GET")
    expect(request?.url.toString()).toBe(
      "http://rundeck.test:4440/api/11/system/info",
    )
    expect(request?.headers["x-rundeck-auth-token"]).toBe("test-secret")
    expect(request?.headers["x-rundeck-api-xml-response-wrapper"]).toBe("true")
    expect(request?.headers.accept).toBe("application/xml")
  })

  it("drops unset parameters", async () => {
    const { requests, run } = setup(() => ok())

    await run((connection) =>
      connection.request("GET", "jobs", {
        params: { project: "ops", groupPath: undefined, max: 5, adhoc: false },
      }),
    )

    const params = requests[0]?.url.searchParams
    expect(params?.get("project")).toBe("ops")
    expect(params?.get("max")).toBe("5")
    expect(params?.get("adhoc")).toBe("false")
    expect(params?.has("groupPath")).toBe(false)
  })

  it("passes extras through untouched", async () => {
    const { requests, run } = setup(() => ok())

    await run((connection) =>
      connection.request("GET", "jobs", {
        params: { project: "ops" },
        extras: { headers: { "X-Trace-Id": "t-1" }, urlParams: { debug: "1" } },
      }),
    )

    expect(requests[0]?.headers["x-trace-id"]).toBe("t-1")
    expect(requests[0]?.url.searchParams.get("debug")).toBe("1")
    expect(requests[0]?.url.searchParams.get("project")).toBe("ops")
  })

  it("form encodes form bodies", async () => {
    const { requests, run } = setup(() => ok())

    await run((connection) =>
      connection.request("POST", "jobs/import", {
        body: {
          _tag: "Form",
          fields: { xmlBatch: "<joblist/>", uuidOption: undefined },
        },
      }),
    )

    const request = requests[0]
    expect(request?.contentType).toBe("application/x-www-form-urlencoded")
    const form = new URLSearchParams(request?.body ?? "")
    expect(form.get("xmlBatch")).toBe("<joblist/>")
    expect(form.has("uuidOption")).toBe(false)
  })

  it("attaches files to multipart bodies", async () => {
    const { requests, run } = setup(() => ok())

    await run((connection) =>
      connection.request("POST", "run/script", {
        body: { _tag: "Multipart", fields: {}, files: { scriptFile: "echo hi" } },
      }),
    )

    expect(requests[0]?.formData?.has("scriptFile")).toBe(true)
  })

  it("fails on non-2xx replies when strict", async () => {
    const { run } = setup(() => ({ status: 500, body: "<error/>" }))

    const error = await run((connection) =>
      Effect.flip(connection.request("GET", "system/info")),
    )

    expect(error._tag).toBe("ResponseError")
  })

  it("returns non-2xx replies when not strict", async () => {
    const { run } = setup(() => ({ status: 404, body: "<result error='true'/>" }), {
      strict: false,
    })

    const raw = await run((connection) => connection.request("GET", "job/x"))

    expect(raw).toEqual({ status: 404, body: "<result error='true'/>" })
  })

  it("lets a call override the strict flag", async () => {
    const { run } = setup(() => ({ status: 404, body: "<result error='true'/>" }))

    const raw = await run((connection) =>
      connection.request("GET", "job/x", { extras: { strict: false } }),
    )

    expect(raw.status).toBe(404)
  })

  it("parses replies into envelopes", async () => {
    const { run } = setup(() =>
      ok("<success><message>Done</message></success>"),
    )

    const envelope = await run((connection) => connection.call("GET", "projects"))

    expect(envelope.success).toBe(true)
    expect(envelope.message).toBe("Done")
    expect(envelope.clientApiVersion).toBe(11)
  })

  it("fails calls whose reply is not XML", async () => {
    const { run } = setup(() => ({ body: "Service Unavailable" }))

    const error = await run((connection) =>
      Effect.flip(connection.call("GET", "projects")),
    )

    expect(error._tag).toBe("MalformedResponse")
  })

  it("checks the minimum API version", async () => {
    const { run } = setup(() => ok(), { apiVersion: 1 })

    const error = await run((connection) =>
      Effect.flip(connection.requireVersion("jobs bulk delete", 5)),
    )

    expect(error).toMatchObject({
      _tag: "UnsupportedOperation",
      message: "jobs bulk delete requires API version '5' or higher",
      requiredVersion: 5,
      apiVersion: 1,
    })
  })

  it("builds API URLs below the base path", async () => {
    const { run } = setup(() => ok(), { basePath: "rundeck" })

    const url = await run((connection) =>
      Effect.succeed(connection.makeApiUrl("/jobs")),
    )

    expect(url).toBe("http://rundeck.test:4440/rundeck/api/11/jobs")
  })
})
