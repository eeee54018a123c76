import { Data } from "effect"
import type { ResponseEnvelope } from "./response"

// --- Response errors ---

export class MalformedResponse extends Data.TaggedError("MalformedResponse")<{
  readonly message: string
  readonly body?: string
  readonly cause?: unknown
}> {}

/**
 * The server answered, but the envelope carries no `success` flag.
 *
 * The originating envelope stays attached so callers can look at the
 * status, message and raw body.
 */
export class ServerError extends Data.TaggedError("ServerError")<{
  readonly message: string
  readonly envelope: ResponseEnvelope<unknown>
}> {}

// --- Caller errors ---

export class UnsupportedOperation extends Data.TaggedError(
  "UnsupportedOperation",
)<{
  readonly message: string
  readonly operation: string
  readonly requiredVersion: number
  readonly apiVersion: number
}> {}

export class NotFound extends Data.TaggedError("NotFound")<{
  readonly message: string
  readonly resource: "job" | "project"
  readonly name: string
}> {}

export class InvalidArgument extends Data.TaggedError("InvalidArgument")<{
  readonly message: string
  readonly argument: string
}> {}

// --- Configuration errors ---

export class InvalidAuthentication extends Data.TaggedError(
  "InvalidAuthentication",
)<{
  readonly message: string
}> {}

export class ApiVersionNotSupported extends Data.TaggedError(
  "ApiVersionNotSupported",
)<{
  readonly message: string
  readonly apiVersion: number
}> {}
