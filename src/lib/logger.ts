import { Inspectable, Layer, Logger, LogLevel } from "effect"
import { SERVICE_NAME } from "./config"

export type SinkLevel = "debug" | "info" | "warn" | "error"

export interface LogEntry {
  readonly level: SinkLevel
  readonly message: string
  readonly service: string
}

/** Receives every log line; lets the host application own the output. */
export type LogSink = (entry: LogEntry) => void

export interface LoggerOptions {
  readonly level?: LogLevel.Literal
  readonly sink?: LogSink
}

export const toSinkLevel = (logLevel: LogLevel.LogLevel): SinkLevel => {
  if (LogLevel.greaterThanEqual(logLevel, LogLevel.Error)) return "error"
  if (LogLevel.greaterThanEqual(logLevel, LogLevel.Warning)) return "warn"
  if (LogLevel.greaterThanEqual(logLevel, LogLevel.Info)) return "info"
  return "debug"
}

const formatMessage = (message: unknown): string =>
  Array.isArray(message) ?
    message.map((part) => Inspectable.toStringUnknown(part)).join(" ")
  : Inspectable.toStringUnknown(message)

export const makeSinkLogger = (sink: LogSink) =>
  Logger.make((log) => {
    sink({
      level: toSinkLevel(log.logLevel),
      message: formatMessage(log.message),
      service: SERVICE_NAME,
    })
  })

/**
 * Replace the default logger.
 *
 * Without a sink lines are written in logfmt; `level` sets the minimum.
 */
export const makeLoggerLayer = (options: LoggerOptions = {}) =>
  Layer.merge(
    Logger.replace(
      Logger.defaultLogger,
      options.sink ? makeSinkLogger(options.sink) : Logger.logfmtLogger,
    ),
    Logger.minimumLogLevel(LogLevel.fromLiteral(options.level ?? "Info")),
  )
