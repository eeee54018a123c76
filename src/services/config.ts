import {
  Config,
  Context,
  Duration,
  Effect,
  Layer,
  Option,
  ParseResult,
  Redacted,
  Schema,
} from "effect"
import {
  DEFAULT_PORT,
  DEFAULT_PORTS,
  DEFAULT_PROTOCOL,
  DEFAULT_SERVER,
  HEADERS,
  JOB_RUN_INTERVAL,
  JOB_RUN_TIMEOUT,
  RUNDECK_API_VERSION,
} from "../lib/config"
import {
  ApiVersionNotSupported,
  InvalidArgument,
  InvalidAuthentication,
} from "../lib/errors"

export interface RundeckConfigShape {
  readonly BASE_URL: string
  readonly API_URL: string
  readonly API_VERSION: number
  readonly API_TOKEN: string
  /** Non-2xx replies fail the request when set */
  readonly STRICT: boolean
  readonly HEADERS: Readonly<Record<string, string>>
  readonly POLL_TIMEOUT: Duration.Duration
  readonly POLL_INTERVAL: Duration.Duration
}

export class RundeckConfig extends Context.Tag("RundeckConfig")<
  RundeckConfig,
  RundeckConfigShape
>() {}

// --- Options ---

const RundeckOptionsSchema = Schema.Struct({
  server: Schema.optional(Schema.NonEmptyTrimmedString),
  protocol: Schema.optional(Schema.Literal("http", "https")),
  port: Schema.optional(Schema.Int.pipe(Schema.between(1, 65535))),
  basePath: Schema.optional(Schema.String),
  apiToken: Schema.optional(Schema.String),
  apiVersion: Schema.optional(Schema.Int),
  strict: Schema.optional(Schema.Boolean),
})

export type RundeckOptions = typeof RundeckOptionsSchema.Type & {
  readonly pollTimeout?: Duration.DurationInput
  readonly pollInterval?: Duration.DurationInput
}

const decodeDuration = (
  name: string,
  input: Duration.DurationInput | undefined,
  fallback: Duration.DurationInput,
): Effect.Effect<Duration.Duration, InvalidArgument> =>
  Option.match(Duration.decodeUnknown(input ?? fallback), {
    onNone: () =>
      Effect.fail(
        new InvalidArgument({
          message: `Invalid duration for '${name}': ${String(input)}`,
          argument: name,
        }),
      ),
    onSome: Effect.succeed,
  })

const trimSlashes = (value: string) => value.replace(/^\/+|\/+$/g, "")

/**
 * Validate connection options and derive the URLs every request is built on.
 */
export const makeRundeckConfig = (
  options: RundeckOptions,
): Effect.Effect<
  RundeckConfigShape,
  InvalidArgument | InvalidAuthentication | ApiVersionNotSupported
> =>
  Effect.gen(function* () {
    const decoded = yield* Schema.decodeUnknown(RundeckOptionsSchema)(
      options,
    ).pipe(
      Effect.mapError(
        (error) =>
          new InvalidArgument({
            message: ParseResult.TreeFormatter.formatErrorSync(error),
            argument: "options",
          }),
      ),
    )

    const apiVersion = decoded.apiVersion ?? RUNDECK_API_VERSION
    if (apiVersion < 1 || apiVersion > RUNDECK_API_VERSION) {
      return yield* new ApiVersionNotSupported({
        message: `The requested API version '${apiVersion}' is not supported. Supported versions: 1-${RUNDECK_API_VERSION}`,
        apiVersion,
      })
    }

    const apiToken = decoded.apiToken
    if (!apiToken) {
      return yield* new InvalidAuthentication({
        message: "An API token is required",
      })
    }

    const protocol = decoded.protocol ?? DEFAULT_PROTOCOL
    const port = decoded.port ?? DEFAULT_PORT
    const host =
      DEFAULT_PORTS[protocol] === port ?
        (decoded.server ?? DEFAULT_SERVER)
      : `${decoded.server ?? DEFAULT_SERVER}:${port}`

    const basePath = decoded.basePath ? trimSlashes(decoded.basePath) : ""
    const baseUrl =
      basePath ? `${protocol}://${host}/${basePath}` : `${protocol}://${host}`

    return {
      BASE_URL: baseUrl,
      API_URL: `${baseUrl}/api/${apiVersion}`,
      API_VERSION: apiVersion,
      API_TOKEN: apiToken,
      STRICT: decoded.strict ?? true,
      HEADERS: {
        [HEADERS.AUTH_TOKEN]: apiToken,
        [HEADERS.XML_RESPONSE_WRAPPER]: "true",
      },
      POLL_TIMEOUT: yield* decodeDuration(
        "pollTimeout",
        options.pollTimeout,
        JOB_RUN_TIMEOUT,
      ),
      POLL_INTERVAL: yield* decodeDuration(
        "pollInterval",
        options.pollInterval,
        JOB_RUN_INTERVAL,
      ),
    } satisfies RundeckConfigShape
  })

export const makeRundeckConfigLayer = (options: RundeckOptions) =>
  Layer.effect(RundeckConfig, makeRundeckConfig(options))

// --- Environment ---

export const rundeckOptionsFromEnv: Config.Config<RundeckOptions> = Config.all(
  {
    server: Config.string("RUNDECK_SERVER").pipe(
      Config.withDefault(DEFAULT_SERVER),
    ),
    protocol: Config.literal("http", "https")("RUNDECK_PROTOCOL").pipe(
      Config.withDefault(DEFAULT_PROTOCOL),
    ),
    port: Config.integer("RUNDECK_PORT").pipe(Config.withDefault(DEFAULT_PORT)),
    basePath: Config.option(Config.string("RUNDECK_BASE_PATH")),
    apiToken: Config.redacted("RUNDECK_API_TOKEN"),
    apiVersion: Config.integer("RUNDECK_API_VERSION").pipe(
      Config.withDefault(RUNDECK_API_VERSION),
    ),
    strict: Config.boolean("RUNDECK_STRICT").pipe(Config.withDefault(true)),
  },
).pipe(
  Config.map(({ basePath, apiToken, ...rest }) => ({
    ...rest,
    basePath: Option.getOrUndefined(basePath),
    apiToken: Redacted.value(apiToken),
  })),
)

export const rundeckConfigFromEnv = Effect.flatMap(
  rundeckOptionsFromEnv,
  makeRundeckConfig,
)
