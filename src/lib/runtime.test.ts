import { Effect } from "effect"
import { describe, expect, it } from "vitest"
import { RundeckConfig } from "../services/config"
import type { LogEntry } from "./logger"
import { makeRundeckLayer, makeRuntime } from "./runtime"

describe("makeRundeckLayer", () => {
  it("provides the config and routes logs to the sink", async () => {
    const entries: LogEntry[] = []
    const layer = makeRundeckLayer({
      server: "scheduler.example.com",
      apiToken: "test-secret",
      logger: { sink: (entry) => entries.push(entry) },
    })

    const apiUrl = await Effect.gen(function* () {
      const config = yield* RundeckConfig
      yield* Effect.logInfo("ready")
      return config.API_URL
    }).pipe(Effect.provide(layer), Effect.runPromise)

    expect(apiUrl).toBe("http://scheduler.example.com:4440/api/11")
    expect(entries.map((entry) => entry.message)).toEqual(["ready"])
  })

  it("fails to build without a token", async () => {
    const exit = await Effect.runPromiseExit(
      RundeckConfig.pipe(Effect.provide(makeRundeckLayer({}))),
    )

    expect(exit._tag).toBe("Failure")
  })
})

describe("makeRuntime", () => {
  it("runs effects against the assembled services", async () => {
    const runtime = makeRuntime({ apiToken: "test-secret", apiVersion: 7 })

    const version = await runtime.runPromise(
      Effect.map(RundeckConfig, (config) => config.API_VERSION),
    )
    await runtime.dispose()

    expect(version).toBe(7)
  })
})
