/**
 * Client for the job scheduler's XML API.
 *
 * @example
 * ```ts
 * import { Effect } from "effect"
 * import { makeRuntime, Rundeck } from "rundeck-effect-client"
 *
 * const runtime = makeRuntime({ server: "scheduler.internal", apiToken: "test-secret" })
 *
 * const result = await runtime.runPromise(
 *   Effect.flatMap(Rundeck, (rundeck) =>
 *     rundeck.runJobAndWait("ops", "nightly-backup", { timeout: "5 minutes" }),
 *   ),
 * )
 * ```
 */

export * from "./lib/errors"
export { makeLoggerLayer } from "./lib/logger"
export type { LogEntry, LoggerOptions, LogSink, SinkLevel } from "./lib/logger"
export { serializeNode, serializeProjectNodes } from "./lib/node"
export type { ResourceNode } from "./lib/node"
export { ResponseEnvelope } from "./lib/response"
export type { EnvelopeSource, Transform } from "./lib/response"
export {
  makeRundeckLayer,
  makeRundeckLayerFromEnv,
  makeRuntime,
} from "./lib/runtime"
export type { RundeckLayerOptions } from "./lib/runtime"
export { isJobId, toArgString } from "./lib/util"
export type { ArgString } from "./lib/util"
export type { XmlDocument, XmlElement } from "./lib/xml"
export { RundeckApi } from "./services/api"
export {
  makeRundeckConfig,
  makeRundeckConfigLayer,
  RundeckConfig,
  rundeckConfigFromEnv,
  rundeckOptionsFromEnv,
} from "./services/config"
export type { RundeckConfigShape, RundeckOptions } from "./services/config"
export { RundeckConnection } from "./services/connection"
export { PollResult, runAndWait, waitForExecution } from "./services/poller"
export type { FetchExecution, SubmittedExecution } from "./services/poller"
export { ProjectLookup, Rundeck } from "./services/rundeck"
export type { DeletionReport, FailedDeletion } from "./services/rundeck"
export * from "./transform"
export type * from "./types"
