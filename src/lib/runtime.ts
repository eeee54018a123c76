import { FetchHttpClient } from "@effect/platform"
import { Layer, ManagedRuntime, pipe } from "effect"
import { RundeckApi } from "../services/api"
import {
  makeRundeckConfigLayer,
  RundeckConfig,
  rundeckConfigFromEnv,
  type RundeckOptions,
} from "../services/config"
import { RundeckConnection } from "../services/connection"
import { Rundeck } from "../services/rundeck"
import { makeLoggerLayer, type LoggerOptions } from "./logger"

export type RundeckLayerOptions = RundeckOptions & {
  readonly logger?: LoggerOptions
}

const makeServicesLayer = <E>(
  ConfigLive: Layer.Layer<RundeckConfig, E>,
  logger: LoggerOptions = {},
) =>
  pipe(
    Rundeck.DefaultWithoutDependencies,
    Layer.provideMerge(RundeckApi.DefaultWithoutDependencies),
    Layer.provideMerge(RundeckConnection.Default),
    Layer.provideMerge(ConfigLive),
    Layer.provide(FetchHttpClient.layer),
    Layer.provideMerge(makeLoggerLayer(logger)),
  )

/** Every client service, over the global `fetch`. */
export const makeRundeckLayer = (options: RundeckLayerOptions) =>
  makeServicesLayer(makeRundeckConfigLayer(options), options.logger)

/** Same as `makeRundeckLayer`, configured from `RUNDECK_*` variables. */
export const makeRundeckLayerFromEnv = (logger?: LoggerOptions) =>
  makeServicesLayer(Layer.effect(RundeckConfig, rundeckConfigFromEnv), logger)

export const makeRuntime = (options: RundeckLayerOptions) =>
  ManagedRuntime.make(makeRundeckLayer(options))
