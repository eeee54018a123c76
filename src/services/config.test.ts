import { ConfigProvider, Duration, Effect } from "effect"
import { describe, expect, it } from "vitest"
import { makeRundeckConfig, rundeckConfigFromEnv } from "./config"

describe("makeRundeckConfig", () => {
  it("fills in the defaults", async () => {
    const config = await Effect.runPromise(
      makeRundeckConfig({ apiToken: "test-secret" }),
    )

    expect(config.BASE_URL).toBe("http://localhost:4440")
    expect(config.API_URL).toBe("http://localhost:4440/api/11")
    expect(config.API_VERSION).toBe(11)
    expect(config.API_TOKEN).toBe("test-secret")
    expect(config.STRICT).toBe(true)
    expect(config.HEADERS).toEqual({
      "X-Rundeck-Auth-Token": "test-secret",
      "X-Rundeck-API-XML-Response-Wrapper": "true",
    })
    expect(Duration.toMillis(config.POLL_TIMEOUT)).toBe(60_000)
    expect(Duration.toMillis(config.POLL_INTERVAL)).toBe(3_000)
  })

  it("leaves the port out when it is the protocol default", async () => {
    const config = await Effect.runPromise(
      makeRundeckConfig({
        server: "scheduler.example.com",
        protocol: "https",
        port: 443,
        basePath: "/rundeck/",
        apiToken: "test-secret",
        apiVersion: 5,
      }),
    )

    expect(config.BASE_URL).toBe("https://scheduler.example.com/rundeck")
    expect(config.API_URL).toBe("https://scheduler.example.com/rundeck/api/5")
  })

  it("keeps a non default port", async () => {
    const config = await Effect.runPromise(
      makeRundeckConfig({
        server: "scheduler.example.com",
        protocol: "https",
        port: 4443,
        apiToken: "test-secret",
      }),
    )

    expect(config.BASE_URL).toBe("https://scheduler.example.com:4443")
  })

  it("accepts poll durations", async () => {
    const config = await Effect.runPromise(
      makeRundeckConfig({
        apiToken: "test-secret",
        pollTimeout: "5 minutes",
        pollInterval: 500,
        strict: false,
      }),
    )

    expect(Duration.toMillis(config.POLL_TIMEOUT)).toBe(300_000)
    expect(Duration.toMillis(config.POLL_INTERVAL)).toBe(500)
    expect(config.STRICT).toBe(false)
  })

  it("rejects unsupported API versions", async () => {
    for (const apiVersion of [0, 12]) {
      const error = await Effect.runPromise(
        Effect.flip(makeRundeckConfig({ apiToken: "test-secret", apiVersion })),
      )

      expect(error._tag).toBe("ApiVersionNotSupported")
      expect(error.message).toBe(
        `The requested API version '${apiVersion}' is not supported. Supported versions: 1-11`,
      )
    }
  })

  it("requires an API token", async () => {
    const error = await Effect.runPromise(Effect.flip(makeRundeckConfig({})))

    expect(error._tag).toBe("InvalidAuthentication")
    expect(error.message).toBe("An API token is required")
  })

  it("rejects invalid options", async () => {
    const error = await Effect.runPromise(
      Effect.flip(makeRundeckConfig({ apiToken: "test-secret", port: 70_000 })),
    )

    expect(error._tag).toBe("InvalidArgument")
    if (error._tag === "InvalidArgument") {
      expect(error.argument).toBe("options")
    }
  })
})

describe("rundeckConfigFromEnv", () => {
  const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
    Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))

  it("reads RUNDECK_* variables", async () => {
    const config = await Effect.runPromise(
      rundeckConfigFromEnv.pipe(
        withEnv([
          ["RUNDECK_SERVER", "env.test"],
          ["RUNDECK_PORT", "80"],
          ["RUNDECK_API_TOKEN", "test-secret"],
          ["RUNDECK_API_VERSION", "9"],
          ["RUNDECK_STRICT", "false"],
        ]),
      ),
    )

    expect(config.API_URL).toBe("http://env.test/api/9")
    expect(config.API_TOKEN).toBe("test-secret")
    expect(config.STRICT).toBe(false)
  })

  it("fails without a token", async () => {
    const exit = await Effect.runPromiseExit(
      rundeckConfigFromEnv.pipe(withEnv([["RUNDECK_SERVER", "env.test"]])),
    )

    expect(exit._tag).toBe("Failure")
  })
})
